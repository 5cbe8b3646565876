/**
 * @pulse/gateway -- HTTP health surface for the host application
 */

export { GatewayServer } from './server.js';
export type { GatewayServerOptions, GatewayAddress } from './server.js';
