import { ConfigError, USAGE, loadConfig, type GatewayConfig } from './config.js';
import { runDiagnostics } from './diagnostics.js';
import { configureLogging, errorMessage } from './logger.js';
import { createGateway, type AcpServer } from './server/AcpServer.js';
import { listenWebSocket, type WebSocketGateway } from './server/http.js';

export { AcpClient } from './client/AcpClient.js';
export { OpenAIChatClient, type ChatStreamClient } from './agent/chat-client.js';
export { OpenAIAgentRuntime } from './agent/OpenAIAgentRuntime.js';
export type { AgentEvent, AgentRuntime, AgentTurn } from './agent/runtime.js';
export { ConfigError, loadConfig, type GatewayConfig } from './config.js';
export { AcpErrorCode, RequestError } from './errors.js';
export { createLogger, configureLogging, Logger } from './logger.js';
export { NdjsonDecoder, encodeFrame } from './protocol/ndjson.js';
export { Connection } from './protocol/connection.js';
export { JsonRpcEngine } from './protocol/json-rpc.js';
export { StreamChannel, WebSocketChannel, type FrameChannel, type MessageSocket } from './protocol/io.js';
export * from './protocol/types.js';
export { AcpServer, createGateway } from './server/AcpServer.js';
export { AcpMethods } from './server/methods.js';
export { listenWebSocket, routeHttp } from './server/http.js';
export { SessionManager, type Session } from './session/SessionManager.js';
export { StreamingNotifier } from './streaming/StreamingNotifier.js';
export { PermissionEngine } from './permissions/engine.js';
export { ToolRegistry, defineTool, defaultTools, type AgentTool } from './tools/index.js';

export async function main(argv: readonly string[] = process.argv.slice(2)) {
  let config: GatewayConfig;
  try {
    config = loadConfig(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }

  if (config.help) {
    console.error(USAGE);
    process.exit(0);
  }

  const logger = configureLogging({ level: config.logLevel, file: config.logFile });

  if (config.diagnose) {
    const report = await runDiagnostics(logger, config);
    console.error('Diagnostics:\n' + JSON.stringify(report, null, 2));
    process.exit(report.compatible ? 0 : 1);
  }

  let gateway: AcpServer | undefined;
  let listener: WebSocketGateway | undefined;
  let stopping = false;

  const shutdown = async (sig: string, code = 0) => {
    if (stopping) return;
    stopping = true;
    logger.info('shutdown.signal', { sig });
    gateway?.stop();
    if (listener) {
      await listener.close();
    }
    process.exit(code);
  };

  process.on('uncaughtException', (error) => {
    logger.error('process.uncaughtException', { error: error.message, stack: error.stack });
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.error('process.unhandledRejection', { reason: errorMessage(reason) });
    void shutdown('UNHANDLED_REJECTION', 1);
  });
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    gateway = createGateway(config, { logger });
    gateway.start();

    if (config.transport === 'stdio') {
      logger.info('gateway.started', { transport: 'stdio', workingDirectory: config.workingDirectory });
      await gateway.serveStdio();
      await shutdown('EOF');
      return;
    }

    listener = await listenWebSocket(gateway, { host: config.host, port: config.port, logger: logger.child('http') });
    logger.info('gateway.started', {
      transport: 'websocket',
      port: listener.address().port,
      workingDirectory: config.workingDirectory,
    });
  } catch (error) {
    logger.error('gateway.startup.failed', { error: errorMessage(error) });
    process.exit(1);
  }
}
