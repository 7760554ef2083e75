import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'

/**
 * Ask a yes/no question on the terminal. Anything but `y`/`yes` is a no.
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input, output })
  let answer = ''
  try {
    answer = await rl.question(`${question} [y/N] `)
  } finally {
    rl.close()
  }
  return ['y', 'yes'].includes(answer.trim().toLowerCase())
}
