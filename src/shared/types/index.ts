export * from './branch'
export * from './config'
