export { MariaDBClient, CLIENT_FLAGS, QUERY_OK } from './mariadb/client.js';
export { PromptChannel, QUIT_COMMAND, spawnPty } from './mariadb/channel.js';
export {
  DEFAULT_PROMPT,
  cleanReply,
  compilePrompt,
  detectCredentialRejection,
  isClientError,
  isStatementComplete,
} from './mariadb/parser.js';
export { scratchFilePath, withScratchFile } from './mariadb/scratch.js';
export { envClientConfig } from './mariadb/types.js';
export type {
  ChannelLaunchOptions,
  ClientConfig,
  DriverState,
  MariaDBClientOptions,
  Outcome,
  SpawnTerminal,
  Terminal,
  TerminalExit,
  TerminalOptions,
  TransportFailure,
} from './mariadb/types.js';
export { config, readConfig, type Config } from './config/index.js';
export { logger, type Logger } from './utils/logger.js';
export * from './utils/errors.js';
