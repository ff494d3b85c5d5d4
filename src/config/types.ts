/**
 * Configuration types for the pattern library server.
 *
 * The patterns directory always comes from the environment. The optional
 * config.yaml only tunes the HTTP server.
 */

/**
 * Environment variable naming the patterns directory. Required.
 */
export const PATTERNS_DIR_ENV = 'PATTERNS_DIR';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Top-level application configuration.
 */
export interface AppConfig {
  /** Absolute path of the patterns directory */
  patternsDir: string;
  server: ServerConfig;
}

/**
 * HTTP server configuration.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: 0.0.0.0) */
  host: string;
  /** Fastify log level (default: info) */
  logLevel: LogLevel;
  /** CORS settings */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Register @fastify/cors (default: true) */
  enabled: boolean;
  /** Allowed origins; ['*'] reflects any origin */
  origins: string[];
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3001,
  host: '0.0.0.0',
  logLevel: 'info',
  cors: {
    enabled: true,
    origins: ['*'],
  },
};
