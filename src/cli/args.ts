import { ConfigurationError } from '../utils/errors'

/**
 * Parsed command line of the reconcile runner
 */
export interface CliOptions {
  input: string
  outDir: string
  tagsUrl?: string
  timeoutMs?: number
  quiet: boolean
}

export const USAGE =
  'Usage: reconcile --input <workbook.xlsx> --out <dir> [--tags-url <url>] [--timeout <ms>] [--quiet]'

const VALUE_FLAGS = ['--input', '--out', '--tags-url', '--timeout'] as const
type ValueFlag = (typeof VALUE_FLAGS)[number]

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((candidate) => candidate === flag)
}

/**
 * Parses `--flag value` and `--flag=value` arguments.
 * `TAG_MAPPING_URL` is used when `--tags-url` is not given.
 *
 * @throws ConfigurationError on unknown flags, missing values or a bad timeout
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): CliOptions {
  const values = new Map<ValueFlag, string>()
  let quiet = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--quiet') {
      quiet = true
      continue
    }

    const eq = arg.indexOf('=')
    const flag = eq === -1 ? arg : arg.slice(0, eq)
    if (!isValueFlag(flag)) {
      throw new ConfigurationError(`Unknown argument '${arg}'`, 'argv')
    }

    let value: string | undefined
    if (eq !== -1) {
      value = arg.slice(eq + 1)
    } else {
      value = argv[i + 1]
      i++
    }
    if (value === undefined || value.trim() === '') {
      throw new ConfigurationError(`Missing value for ${flag}`, flag)
    }
    values.set(flag, value.trim())
  }

  const input = values.get('--input')
  const outDir = values.get('--out')
  if (!input || !outDir) {
    throw new ConfigurationError(USAGE, input ? '--out' : '--input')
  }

  let timeoutMs: number | undefined
  const timeout = values.get('--timeout')
  if (timeout !== undefined) {
    timeoutMs = Number(timeout)
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(
        `--timeout must be a positive integer, got '${timeout}'`,
        '--timeout'
      )
    }
  }

  const envUrl = env.TAG_MAPPING_URL?.trim()
  const tagsUrl = values.get('--tags-url') ?? (envUrl ? envUrl : undefined)

  return { input, outDir, tagsUrl, timeoutMs, quiet }
}
