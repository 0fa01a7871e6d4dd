/**
 * Constants shared by the parser, renderer and formatter.
 */

/**
 * Separator between the fields of one input line.
 * Git emits it for `%00`; it cannot occur in ref names or hashes.
 */
export const FIELD_SEPARATOR = '\0'

/**
 * Number of fields in one input line.
 */
export const FIELD_COUNT = 7

/**
 * Indentation added per level of upstream tracking.
 */
export const INDENT_STEP = '  '

/**
 * `git branch --format` string that produces the expected input, e.g.
 *
 *   git branch --format='%(HEAD)%00...' | git-br
 */
export const BRANCH_FORMAT = [
  '%(HEAD)',
  '%(objectname:short=7)',
  '%(refname)',
  '%(refname:short)',
  '%(upstream)',
  '%(upstream:short)',
  '%(upstream:track)'
].join('%00')

/**
 * Marker printed in the table layout in front of the checked-out branch.
 */
export const CURRENT_BRANCH_MARKER = '●'

export const ANSI = {
  reset: '\x1b[0m',
  resetColor: '\x1b[39;49m',
  bold: '\x1b[1m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m'
} as const
