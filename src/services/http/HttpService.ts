import type { HttpMethod } from '../../errors/ApiError.js'

export type { HttpMethod }

export interface HttpRequest {
  method: HttpMethod
  url: string
  headers?: Record<string, string>
  data?: unknown
}

/**
 * Response of any status. Bodies are parsed JSON when the server sent JSON,
 * otherwise the raw text.
 */
export interface HttpResponse {
  status: number
  data: unknown
  contentType?: string
}

export interface HttpService {
  request(request: HttpRequest): Promise<HttpResponse>
}
