/**
 * Namespaced diagnostic loggers.
 *
 * Output is off unless the host enables it, e.g.
 * `DEBUG=string-automata:*` or `DEBUG=string-automata:*:warn`.
 *
 * @packageDocumentation
 */

import debug, { type Debugger } from 'debug'

const ROOT_NAMESPACE = 'string-automata'

const areas = ['build', 'search', 'persist'] as const
const levels = ['info', 'warn', 'debug'] as const

/** Area of the library a logger belongs to. */
export type LogArea = (typeof areas)[number]

/** Severity suffix of a namespace. */
export type LogLevel = (typeof levels)[number]

/** One debugger per level, all under `string-automata:<area>:<level>`. */
export type Logger = { readonly [L in LogLevel]: Debugger }

function createLogger(area: LogArea): Logger {
  return {
    info: debug(`${ROOT_NAMESPACE}:${area}:info`),
    warn: debug(`${ROOT_NAMESPACE}:${area}:warn`),
    debug: debug(`${ROOT_NAMESPACE}:${area}:debug`),
  }
}

export const log: { readonly [A in LogArea]: Logger } = {
  build: createLogger('build'),
  search: createLogger('search'),
  persist: createLogger('persist'),
}

/**
 * Every namespace this library writes to, for hosts that want to enable
 * them selectively.
 */
export const namespaces: readonly string[] = areas.flatMap((area) =>
  levels.map((level) => `${ROOT_NAMESPACE}:${area}:${level}`),
)
