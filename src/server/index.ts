/**
 * Service Module
 */

export { startService } from './service.js'
export type { Service, ServiceOptions, ServiceRequestInit } from './service.js'
