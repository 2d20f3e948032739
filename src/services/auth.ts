import { ERROR_MESSAGES, POWERBI_RESOURCE, TOKEN_ENDPOINT } from '../constants.js'
import { ApiError, AuthError } from '../errors/index.js'
import { TokenResponseSchema } from '../schemas/api-responses.js'
import type { AccessToken, Credentials } from '../types.js'
import type { Logger } from '../utils/logger.js'
import { sharedLogger } from '../utils/shared-logger.js'
import { AxiosHttpService, type HttpResponse, type HttpService } from './http/index.js'
import { getErrorMessage, isErrorStatus } from './response-errors.js'

export interface AuthenticateOptions {
  http?: HttpService
  logger?: Logger
}

/**
 * Exchange user credentials for a Power BI access token (OAuth2 password grant)
 *
 * @throws {AuthError} when Azure AD rejects the credentials, answers without
 *   a token, or cannot be reached
 */
export async function authenticate(
  credentials: Credentials,
  options: AuthenticateOptions = {}
): Promise<AccessToken> {
  const http = options.http ?? new AxiosHttpService()
  const logger = (options.logger ?? sharedLogger).child('auth')

  const form = new URLSearchParams({
    username: credentials.username,
    password: credentials.password,
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
    resource: POWERBI_RESOURCE,
    grant_type: 'password',
    scope: 'openid'
  })

  let response: HttpResponse
  try {
    response = await http.request({
      method: 'POST',
      url: TOKEN_ENDPOINT,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json'
      },
      data: form.toString()
    })
  } catch (error) {
    if (error instanceof ApiError) {
      throw new AuthError(`Could not reach the Azure authentication API: ${error.message}`)
    }
    throw error
  }

  if (isErrorStatus(response.status)) {
    throw new AuthError(
      getErrorMessage(response, { whileTrying: 'retrieving access token' }),
      response.data,
      { statusCode: response.status }
    )
  }

  const parsed = TokenResponseSchema.safeParse(response.data)
  if (!parsed.success) {
    throw new AuthError(ERROR_MESSAGES.MISSING_TOKEN, response.data, {
      statusCode: response.status
    })
  }

  logger.info('Retrieved Power BI access token', { username: credentials.username })
  return parsed.data.access_token
}
