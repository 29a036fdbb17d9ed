import {
  InvalidContextMissingStrategyError,
  InvalidDaemonAddressError,
} from './errors.js'
import type { ContextMissingStrategy, DaemonAddress } from './types.js'

export const DEFAULT_DAEMON_ADDRESS = `127.0.0.1:2000`
export const DEFAULT_CONTEXT_MISSING_STRATEGY: ContextMissingStrategy = `LOG_ERROR`

export const DAEMON_ADDRESS_ENV = `AWS_XRAY_DAEMON_ADDRESS`
export const CONTEXT_MISSING_ENV = `AWS_XRAY_CONTEXT_MISSING`

const CONTEXT_MISSING_STRATEGIES: ReadonlyArray<ContextMissingStrategy> = [
  `LOG_ERROR`,
  `RUNTIME_ERROR`,
  `IGNORE_ERROR`,
]

export function parseDaemonAddress(address: string): DaemonAddress {
  const separator = address.lastIndexOf(`:`)
  if (separator <= 0) {
    throw new InvalidDaemonAddressError(address)
  }
  const host = address.slice(0, separator).trim()
  const portText = address.slice(separator + 1).trim()
  const port = Number(portText)
  if (
    host.length === 0 ||
    !/^\d+$/.test(portText) ||
    port < 1 ||
    port > 65535
  ) {
    throw new InvalidDaemonAddressError(address)
  }
  return { host, port }
}

function isContextMissingStrategy(value: string): value is ContextMissingStrategy {
  return CONTEXT_MISSING_STRATEGIES.some((strategy) => strategy === value)
}

export function parseContextMissingStrategy(value: string): ContextMissingStrategy {
  const normalized = value.trim().toUpperCase()
  if (!isContextMissingStrategy(normalized)) {
    throw new InvalidContextMissingStrategyError(value)
  }
  return normalized
}

export interface RecorderEnvSettings {
  daemonAddress?: DaemonAddress
  contextMissingStrategy?: ContextMissingStrategy
}

/**
 * Reads recorder settings from environment variables. Unset variables are
 * left out; malformed ones throw.
 */
export function readRecorderEnv(
  env: NodeJS.ProcessEnv = process.env,
): RecorderEnvSettings {
  const settings: RecorderEnvSettings = {}

  const daemonAddress = env[DAEMON_ADDRESS_ENV]
  if (daemonAddress) {
    settings.daemonAddress = parseDaemonAddress(daemonAddress)
  }

  const contextMissing = env[CONTEXT_MISSING_ENV]
  if (contextMissing) {
    settings.contextMissingStrategy = parseContextMissingStrategy(contextMissing)
  }

  return settings
}
