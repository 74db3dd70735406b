export { createMcpServer, SERVER_INSTRUCTIONS, SERVER_NAME, SERVER_VERSION } from './server.js'
export type { McpServerOptions } from './server.js'
