/**
 * Password Changer
 *
 * Asks for the server address and the current and new passwords through a
 * PromptPort, then POSTs the password-change form to the running server.
 */

import { defaults } from '../config/defaults'
import { ErrorCodes, ServerManagerError, logDebug } from './error-handler'
import type { FetchFn, PasswordChangeResult } from '../types'

export type PromptQuestion = {
  message: string
  // Shown to the user; applied by the changer when the answer is blank
  default?: string
  secret?: boolean
}

/**
 * Input/output capability for the interactive flow.
 * The CLI backs it with inquirer; tests script the answers.
 */
export type PromptPort = {
  ask(question: PromptQuestion): Promise<string>
  print(message: string): void
}

export type PasswordChangeRequest = {
  address: string
  currentPassword: string
  newPassword: string
}

/**
 * Message of the first entry of a reply's `errors` list, or null when the
 * list is absent or empty. Undefined for replies that are not JSON objects.
 */
function firstErrorMessage(body: unknown): string | null | undefined {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined
  }
  const errors: unknown = Reflect.get(body, 'errors')
  if (!Array.isArray(errors) || errors.length === 0) return null

  const first: unknown = errors[0]
  const message =
    typeof first === 'object' && first !== null
      ? Reflect.get(first, 'message')
      : first
  return typeof message === 'string' ? message : 'unknown error'
}

export class PasswordChanger {
  private readonly fetchImpl: FetchFn

  constructor(
    private readonly prompt: PromptPort,
    options: { fetchImpl?: FetchFn } = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async run(): Promise<PasswordChangeResult> {
    this.prompt.print('This will change the password for a Neo4j server')

    const request = await this.promptForRequest()
    const result = await this.send(request)

    if (result.success) {
      this.prompt.print(
        'Password changed successfully! Please update your app to use:',
      )
      this.prompt.print(`username: ${result.username}`)
      this.prompt.print(`password: ${result.password}`)
    } else {
      this.prompt.print(`An error was returned: ${result.message}`)
    }

    return result
  }

  /**
   * @throws MISSING_NEW_PASSWORD when the new password is left blank
   */
  async promptForRequest(): Promise<PasswordChangeRequest> {
    const address = await this.askWithDefault({
      message: 'Server address (protocol, host and port)',
      default: defaults.passwordChangeAddress,
    })

    const currentPassword = await this.askWithDefault({
      message: 'Current password (leave blank for a fresh installation)',
      default: defaults.currentPassword,
      secret: true,
    })

    const newPassword = await this.prompt.ask({
      message: 'New password',
      secret: true,
    })
    if (newPassword.trim() === '') {
      throw new ServerManagerError(
        ErrorCodes.MISSING_NEW_PASSWORD,
        'A new password is required',
      )
    }

    return { address, currentPassword, newPassword }
  }

  /**
   * POST <address>/user/neo4j/password with form fields password, new_password
   *
   * @throws PASSWORD_CHANGE_FAILED when the reply is not a JSON object
   */
  async send(request: PasswordChangeRequest): Promise<PasswordChangeResult> {
    const username = defaults.adminUsername
    const url = `${request.address.replace(/\/+$/, '')}/user/${username}/password`

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        password: request.currentPassword,
        new_password: request.newPassword,
      }).toString(),
    })

    const text = await response.text()
    logDebug('Password change response', { url, status: response.status })

    let body: unknown = {}
    if (text.trim() !== '') {
      try {
        body = JSON.parse(text)
      } catch {
        throw new ServerManagerError(
          ErrorCodes.PASSWORD_CHANGE_FAILED,
          `Unexpected response from ${url} (status ${response.status})`,
          'error',
          undefined,
          { url, status: response.status },
        )
      }
    }

    const errorMessage = firstErrorMessage(body)
    if (errorMessage === undefined) {
      throw new ServerManagerError(
        ErrorCodes.PASSWORD_CHANGE_FAILED,
        `Unexpected response from ${url} (status ${response.status})`,
      )
    }
    if (errorMessage !== null) {
      return { success: false, message: errorMessage }
    }

    return { success: true, username, password: request.newPassword }
  }

  private async askWithDefault(question: PromptQuestion): Promise<string> {
    const answer = await this.prompt.ask(question)
    return answer.trim() === '' ? (question.default ?? '') : answer
  }
}
