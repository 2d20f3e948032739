/**
 * HTTP Service Module
 */

export { AxiosHttpService } from './AxiosHttpService.js'
export type { HttpMethod, HttpRequest, HttpResponse, HttpService } from './HttpService.js'
