import axios, { type AxiosInstance } from 'axios'
import { API_TIMEOUT } from '../../constants.js'
import { ApiError } from '../../errors/ApiError.js'
import { sanitizeMessage } from '../../utils/sanitizer.js'
import type { HttpRequest, HttpResponse, HttpService } from './HttpService.js'

export class AxiosHttpService implements HttpService {
  private readonly client: AxiosInstance

  constructor(private readonly timeout: number = API_TIMEOUT) {
    this.client = axios.create({
      timeout,
      // Status classification belongs to the caller
      validateStatus: () => true
    })
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.data
      })

      const contentType = response.headers['content-type']
      return {
        status: response.status,
        data: response.data,
        contentType: typeof contentType === 'string' ? contentType : undefined
      }
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error
      }

      const message =
        error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
          ? `Request timed out after ${this.timeout}ms`
          : sanitizeMessage(error.message)

      throw new ApiError(0, request.method, request.url, message, undefined, {
        code: error.code
      })
    }
  }
}
