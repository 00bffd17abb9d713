export type { QueryGatewayOptions } from './gateway'
export { QueryGateway } from './gateway'
