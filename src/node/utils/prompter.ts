/**
 * Interactive prompting on the controlling terminal.
 *
 * The workflow depends only on the Prompter interface; ConsolePrompter is the
 * readline-backed implementation used by the CLI.
 */

import readline from 'node:readline'

export interface Prompter {
  confirm(question: string, defaultValue?: boolean): Promise<boolean>
  promptString(question: string, defaultValue: string): Promise<string>
  select<T extends string>(question: string, choices: readonly T[], defaultValue: T): Promise<T>
}

/**
 * Interpret a yes/no answer. Empty or unrecognised answers yield the default.
 */
export function parseConfirmation(answer: string, defaultValue: boolean): boolean {
  const normalized = answer.trim().toLowerCase()
  if (normalized === 'y' || normalized === 'yes') return true
  if (normalized === 'n' || normalized === 'no') return false
  return defaultValue
}

/**
 * Match an answer against choices by exact name (case-insensitive), unique
 * prefix, or 1-based index. Anything else yields the default.
 */
export function parseChoice<T extends string>(
  answer: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const normalized = answer.trim().toLowerCase()
  if (!normalized) return defaultValue

  const exact = choices.find((choice) => choice.toLowerCase() === normalized)
  if (exact) return exact

  const index = Number(normalized)
  if (Number.isInteger(index) && index >= 1 && index <= choices.length) {
    return choices[index - 1] ?? defaultValue
  }

  const prefixed = choices.filter((choice) => choice.toLowerCase().startsWith(normalized))
  return prefixed.length === 1 ? (prefixed[0] ?? defaultValue) : defaultValue
}

export class ConsolePrompter implements Prompter {
  private rl?: readline.Interface
  private closed = false
  private readonly lines: string[] = []
  private readonly waiting: Array<(answer: string) => void> = []

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private lineReader(): readline.Interface {
    if (this.rl) return this.rl
    // Lines are queued as they arrive: piped input may deliver several
    // answers in one chunk before the next question is asked
    const rl = readline.createInterface({ input: this.input, terminal: false })
    rl.on('line', (line) => {
      const next = this.waiting.shift()
      if (next) {
        next(line)
      } else {
        this.lines.push(line)
      }
    })
    rl.once('close', () => {
      this.closed = true
      for (const next of this.waiting.splice(0)) next('')
    })
    this.rl = rl
    return rl
  }

  private ask(query: string): Promise<string> {
    this.output.write(query)

    const buffered = this.lines.shift()
    if (buffered !== undefined) return Promise.resolve(buffered)
    // Input ended (e.g. piped stdin exhausted): treat as an empty answer
    if (this.closed) return Promise.resolve('')

    const rl = this.lineReader()
    // Paused between questions so interactive child processes get the terminal
    rl.resume()
    return new Promise((resolve) => {
      this.waiting.push((answer) => {
        rl.pause()
        resolve(answer)
      })
    })
  }

  /**
   * Release the input stream. Questions asked afterwards get the default.
   */
  close(): void {
    if (this.rl) {
      this.rl.close()
    } else {
      this.closed = true
    }
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? '[Y/n]' : '[y/N]'
    const answer = await this.ask(`${question} ${hint} `)
    return parseConfirmation(answer, defaultValue)
  }

  async promptString(question: string, defaultValue: string): Promise<string> {
    const answer = await this.ask(defaultValue ? `${question} [${defaultValue}]: ` : `${question}: `)
    return answer.trim() || defaultValue
  }

  async select<T extends string>(question: string, choices: readonly T[], defaultValue: T): Promise<T> {
    const options = choices.map((choice, i) => `${i + 1}) ${choice}`).join('  ')
    const answer = await this.ask(`${question} ${options} [${defaultValue}]: `)
    return parseChoice(answer, choices, defaultValue)
  }
}
