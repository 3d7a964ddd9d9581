import { spawn } from 'node:child_process'

export interface RunCommandOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** 中断時に子プロセスを kill する */
  signal?: AbortSignal
}

const describe = (command: string, args: string[]) => `${command} ${args.join(' ')}`

export const runCommand = (command: string, args: string[], options: RunCommandOptions = {}): Promise<void> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      signal: options.signal,
      stdio: ['ignore', 'ignore', 'pipe'],
    })

    let stderr = ''
    child.stderr?.on('data', (chunk) => {
      stderr += chunk.toString()
    })

    child.on('error', (error) => reject(error))
    child.on('exit', (code) => {
      if (code === 0) {
        resolve()
      } else {
        const detail = stderr.trim()
        reject(new Error(`${describe(command, args)} exited with code ${code}${detail ? `: ${detail}` : ''}`))
      }
    })
  })
