import { describe, it, expect, vi, beforeEach } from 'vitest'
import { checkGpg, checkPowershell } from '../../../src/doctor/checks.js'

vi.mock('../../../src/util/exec.js', () => ({
  execCommand: vi.fn(),
}))

import { execCommand } from '../../../src/util/exec.js'

const mockExecCommand = vi.mocked(execCommand)

beforeEach(() => {
  vi.resetAllMocks()
})

// ---------------------------------------------------------------------------
// checkGpg
// ---------------------------------------------------------------------------

describe('checkGpg', () => {
  it('returns ok with the first line of the version output', async () => {
    mockExecCommand.mockResolvedValue('gpg (GnuPG) 2.4.5\nlibgcrypt 1.10.3\nHome: /root/.gnupg')
    const result = await checkGpg()
    expect(result).toEqual({ name: 'gpg', status: 'ok', version: 'gpg (GnuPG) 2.4.5' })
    expect(mockExecCommand).toHaveBeenCalledWith('gpg', ['--version'])
  })

  it('returns ok for gpg exactly 2.1', async () => {
    mockExecCommand.mockResolvedValue('gpg (GnuPG) 2.1')
    const result = await checkGpg()
    expect(result.status).toBe('ok')
  })

  it('returns version-unsupported for gpg 1.x', async () => {
    mockExecCommand.mockResolvedValue('gpg (GnuPG) 1.4.23')
    const result = await checkGpg()
    expect(result.status).toBe('version-unsupported')
    expect(result.reason).toBe('gpg >= 2.1.0 is required for loopback pinentry')
  })

  it('returns version-unsupported when the version cannot be parsed', async () => {
    mockExecCommand.mockResolvedValue('gpg (GnuPG) unknown')
    const result = await checkGpg()
    expect(result.status).toBe('version-unsupported')
    expect(result.reason).toContain('parse')
  })

  it('returns missing when execCommand throws', async () => {
    mockExecCommand.mockRejectedValue(new Error('not found'))
    const result = await checkGpg('/opt/gnupg/bin/gpg')
    expect(result.status).toBe('missing')
    expect(result.reason).toBe('/opt/gnupg/bin/gpg not found in PATH (not found)')
  })
})

// ---------------------------------------------------------------------------
// checkPowershell
// ---------------------------------------------------------------------------

describe('checkPowershell', () => {
  it('returns ok with the version', async () => {
    mockExecCommand.mockResolvedValue('5.1.22621.2506')
    const result = await checkPowershell()
    expect(result).toEqual({ name: 'powershell', status: 'ok', version: '5.1.22621.2506' })
  })

  it('returns missing when execCommand throws', async () => {
    mockExecCommand.mockRejectedValue(new Error('not found'))
    const result = await checkPowershell()
    expect(result.status).toBe('missing')
    expect(result.reason).toContain('WINDOWS_DPAPI')
  })
})
