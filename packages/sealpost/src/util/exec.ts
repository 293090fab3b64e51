/**
 * CLI spawn wrapper for executing external commands.
 */

import { spawn } from 'node:child_process'

/** Options for command execution. */
export interface ExecCommandOptions {
  /** Input to write to stdin */
  stdin?: string | undefined
  /** Timeout in milliseconds */
  timeoutMs?: number | undefined
}

/** Result of a command execution. */
export interface ExecCommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Handler for one line of output of an interactive command. A returned string
 * is written to the command's stdin, followed by a newline.
 */
export type LineHandler = (line: string) => Promise<string | undefined> | string | undefined

/**
 * Execute a command and return stdout.
 * @throws Error if the command exits with a non-zero code.
 */
export async function execCommand(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<string> {
  const result = await execCommandFull(command, args, options)
  if (result.exitCode !== 0) {
    throw new Error(`Command failed with exit code ${String(result.exitCode)}: ${result.stderr}`)
  }
  return result.stdout.trim()
}

/**
 * Execute a command and return the full result.
 */
export function execCommandFull(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: [options?.stdin !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    })
    let stdout = ''
    let stderr = ''
    let timer: ReturnType<typeof setTimeout> | undefined

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (options?.stdin !== undefined && proc.stdin) {
      proc.stdin.write(options.stdin)
      proc.stdin.end()
    }

    if (options?.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error(`Command timed out after ${String(options.timeoutMs)}ms`))
      }, options.timeoutMs)
    }

    proc.on('close', (code) => {
      clearTimeout(timer)
      resolve({ stdout, stderr, exitCode: code ?? 1 })
    })

    proc.on('error', (error) => {
      clearTimeout(timer)
      reject(error)
    })
  })
}

/**
 * Execute a command that converses over stdin/stdout.
 *
 * @remarks
 * Each complete stdout line is passed to `onLine`, strictly in order; the next
 * line is not handled until the previous handler settled. If a handler
 * rejects, the process is killed and the returned promise rejects with the
 * handler's error. stdin stays open until the process exits.
 */
export function execCommandInteractive(
  command: string,
  args: string[],
  onLine: LineHandler,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    let pending = ''
    let failure: unknown
    let queue: Promise<void> = Promise.resolve()

    const handle = (line: string): void => {
      queue = queue.then(async () => {
        if (failure !== undefined) return
        try {
          const reply = await onLine(line)
          if (reply !== undefined && proc.stdin.writable) {
            proc.stdin.write(`${reply}\n`)
          }
        } catch (error) {
          failure = error
          proc.kill('SIGTERM')
        }
      })
    }

    proc.stdout.on('data', (data: Buffer) => {
      const text = data.toString()
      stdout += text
      pending += text
      let newline = pending.indexOf('\n')
      while (newline !== -1) {
        handle(pending.slice(0, newline).replace(/\r$/, ''))
        pending = pending.slice(newline + 1)
        newline = pending.indexOf('\n')
      }
    })

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    // The command may exit without reading what was written to it.
    proc.stdin.on('error', (error: Error) => {
      stderr += `stdin: ${error.message}\n`
    })

    proc.on('close', (code) => {
      proc.stdin.end()
      if (pending !== '') {
        handle(pending)
        pending = ''
      }
      void queue.then(() => {
        if (failure !== undefined) {
          reject(failure)
          return
        }
        resolve({ stdout, stderr, exitCode: code ?? 1 })
      })
    })

    proc.on('error', (error) => {
      reject(error)
    })
  })
}
