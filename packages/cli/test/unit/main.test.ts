import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { HELP_TEXT, main } from '../../src/main.js'

describe('main', () => {
  let stdoutOutput: string
  let stderrOutput: string

  beforeEach(() => {
    stdoutOutput = ''
    stderrOutput = ''
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it.each([[[]], [['--help']], [['-h']]])('prints help for %j', async (argv) => {
    expect(await main(argv)).toBe(0)
    expect(stdoutOutput).toBe(HELP_TEXT)
  })

  it('lists every command in the help', () => {
    for (const command of ['encrypt', 'decrypt', 'test-secrets', 'doctor']) {
      expect(HELP_TEXT).toContain(`  ${command} `)
    }
  })

  it('rejects an unknown command', async () => {
    expect(await main(['frobnicate'])).toBe(1)
    expect(stderrOutput).toBe('Unknown command: frobnicate\n')
    expect(stdoutOutput).toBe(HELP_TEXT)
  })

  it('dispatches to the command', async () => {
    expect(await main(['encrypt'])).toBe(1)
    expect(stderrOutput).toContain('Settings source required')
  })
})
