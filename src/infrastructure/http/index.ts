export { createFetchTransport } from './transport.js';
export type { HttpRequest, HttpResponse, HttpTransport } from './transport.js';
