export { createServer, type GatewayFastifyInstance, type ServerOptions } from './create-server';
