import { describe, it, expect } from 'vitest'
import { parseCliArgs, USAGE } from '../../../src/cli/args'
import { ConfigurationError } from '../../../src/utils/errors'

describe('parseCliArgs', () => {
  it('should read space-separated flag values', () => {
    expect(parseCliArgs(['--input', 'in.xlsx', '--out', 'out'])).toEqual({
      input: 'in.xlsx',
      outDir: 'out',
      tagsUrl: undefined,
      timeoutMs: undefined,
      quiet: false,
    })
  })

  it('should read equals-separated flag values', () => {
    const options = parseCliArgs([
      '--input=in.xlsx',
      '--out=out',
      '--tags-url=https://tags.example.test',
      '--timeout=2500',
      '--quiet',
    ])

    expect(options).toEqual({
      input: 'in.xlsx',
      outDir: 'out',
      tagsUrl: 'https://tags.example.test',
      timeoutMs: 2500,
      quiet: true,
    })
  })

  it('should fall back to TAG_MAPPING_URL', () => {
    const options = parseCliArgs(['--input', 'a', '--out', 'b'], {
      TAG_MAPPING_URL: ' https://env.example.test ',
    })
    expect(options.tagsUrl).toBe('https://env.example.test')
  })

  it('should prefer the flag over the environment', () => {
    const options = parseCliArgs(['--input', 'a', '--out', 'b', '--tags-url', 'https://flag.example.test'], {
      TAG_MAPPING_URL: 'https://env.example.test',
    })
    expect(options.tagsUrl).toBe('https://flag.example.test')
  })

  it('should ignore a blank environment URL', () => {
    expect(parseCliArgs(['--input', 'a', '--out', 'b'], { TAG_MAPPING_URL: '  ' }).tagsUrl).toBeUndefined()
  })

  it('should require input and output', () => {
    expect(() => parseCliArgs(['--input', 'a'])).toThrow(USAGE)
    expect(() => parseCliArgs([])).toThrow(ConfigurationError)
  })

  it('should reject unknown flags and missing values', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow("Unknown argument '--verbose'")
    expect(() => parseCliArgs(['--input'])).toThrow('Missing value for --input')
  })

  it('should reject a bad timeout', () => {
    expect(() => parseCliArgs(['--input', 'a', '--out', 'b', '--timeout', 'soon'])).toThrow(
      "--timeout must be a positive integer, got 'soon'"
    )
    expect(() => parseCliArgs(['--input', 'a', '--out', 'b', '--timeout=0'])).toThrow(
      ConfigurationError
    )
  })
})
