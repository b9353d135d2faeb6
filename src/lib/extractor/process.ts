import { spawn } from 'child_process'

export class ProcessError extends Error {
  constructor(
    message: string,
    public stdout = '',
    public stderr = '',
    public exitCode: number | null = null,
    public code?: string,
  ) {
    super(message)
    this.name = 'ProcessError'
  }
}

export class ProcessTimeoutError extends Error {
  constructor(public command: string, public timeoutMs: number) {
    super(`${command} timed out after ${timeoutMs}ms`)
    this.name = 'ProcessTimeoutError'
  }
}

export interface RunOptions {
  timeoutMs: number
  env?: NodeJS.ProcessEnv
}

export type CommandExecutor = (
  command: string,
  args: string[],
  options: RunOptions,
) => Promise<string>

const errorCode = (err: Error) =>
  'code' in err && typeof err.code === 'string' ? err.code : undefined

/** Spawn a command and resolve with its stdout on exit code 0. */
export const runCommand: CommandExecutor = (command, args, options) =>
  new Promise((resolve, reject) => {
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      fn()
    }

    const p = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env ?? process.env,
    })

    const timer = setTimeout(() => {
      p.kill('SIGKILL')
      settle(() => reject(new ProcessTimeoutError(command, options.timeoutMs)))
    }, options.timeoutMs)

    p.stdout.on('data', (d: Buffer) => stdout.push(d))
    p.stderr.on('data', (d: Buffer) => stderr.push(d))
    p.on('error', (err) =>
      settle(() =>
        reject(
          new ProcessError(
            err.message,
            Buffer.concat(stdout).toString(),
            Buffer.concat(stderr).toString(),
            null,
            errorCode(err),
          ),
        ),
      ),
    )
    p.on('close', (code) =>
      settle(() => {
        const out = Buffer.concat(stdout).toString()
        if (code === 0) return resolve(out)
        reject(
          new ProcessError(
            `${command} exit ${code}`,
            out,
            Buffer.concat(stderr).toString(),
            code,
          ),
        )
      }),
    )
  })
