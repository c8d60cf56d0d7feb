import inquirer from 'inquirer'
import type { PromptPort, PromptQuestion } from '../../core/password-changer'

async function askQuestion(question: PromptQuestion): Promise<string> {
  if (question.secret) {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'password',
        name: 'answer',
        message: question.default
          ? `${question.message} [${question.default}]:`
          : `${question.message}:`,
        mask: '*',
      },
    ])
    return answer
  }

  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: 'input',
      name: 'answer',
      message: `${question.message}:`,
      default: question.default,
    },
  ])
  return answer
}

/**
 * Terminal-backed prompt port for the password change flow
 */
export const terminalPromptPort: PromptPort = {
  ask: askQuestion,
  print(message: string): void {
    console.log(message)
  },
}

/**
 * Prompt for confirmation using arrow-key selection
 */
export async function promptConfirm(
  message: string,
  defaultValue: boolean = true,
): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: string }>([
    {
      type: 'list',
      name: 'confirmed',
      message,
      choices: [
        { name: 'Yes', value: 'yes' },
        { name: 'No', value: 'no' },
      ],
      default: defaultValue ? 'yes' : 'no',
    },
  ])

  return confirmed === 'yes'
}
