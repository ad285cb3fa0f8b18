// Utilities: Configuration management
// Pure functions, no external dependencies

export type NodeEnv = 'development' | 'production' | 'test';

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: NodeEnv;
  corsOrigins: string[];
}

export interface GameDefaults {
  maxHp: number;
  maxMp: number;
  initialMpRatio: number;
  recentLogCount: number;
  defaultDifficulty: string;
  characterName: string;
  seed?: number;
}

export interface SessionLimits {
  maxActiveSessions: number;
}

export interface AppConfig {
  server: ServerConfig;
  game: GameDefaults;
  sessions: SessionLimits;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    corsOrigins: parseList(env.CORS_ORIGINS, ['http://localhost:3000', 'http://127.0.0.1:3000']),
  };
}

export function buildGameDefaults(env: NodeJS.ProcessEnv = process.env): GameDefaults {
  const seed = env.GAME_SEED ? parseInt(env.GAME_SEED, 10) : undefined;

  return {
    maxHp: parseInt(env.GAME_MAX_HP || '100', 10),
    maxMp: parseInt(env.GAME_MAX_MP || '100', 10),
    initialMpRatio: parseFloat(env.GAME_INITIAL_MP_RATIO || '0.5'),
    recentLogCount: parseInt(env.GAME_RECENT_LOG_COUNT || '8', 10),
    defaultDifficulty: env.GAME_DEFAULT_DIFFICULTY || 'normal',
    characterName: env.GAME_CHARACTER_NAME || '无名修士',
    ...(seed !== undefined ? { seed } : {}),
  };
}

export function buildSessionLimits(env: NodeJS.ProcessEnv = process.env): SessionLimits {
  return {
    maxActiveSessions: parseInt(env.SESSION_MAX_ACTIVE || '1000', 10),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    game: buildGameDefaults(env),
    sessions: buildSessionLimits(env),
  };
}

// Validation
export function validateConfig(
  config: AppConfig,
  knownDifficulties: readonly string[] = ['easy', 'normal', 'hard', '简单', '普通', '困难']
): string[] {
  const errors: string[] = [];
  const { server, game, sessions } = config;

  if (!Number.isInteger(server.port) || server.port < 1 || server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (!Number.isInteger(game.maxHp) || game.maxHp < 1) {
    errors.push('GAME_MAX_HP must be a positive integer');
  }

  if (!Number.isInteger(game.maxMp) || game.maxMp < 1) {
    errors.push('GAME_MAX_MP must be a positive integer');
  }

  if (!Number.isFinite(game.initialMpRatio) || game.initialMpRatio < 0 || game.initialMpRatio > 1) {
    errors.push('GAME_INITIAL_MP_RATIO must be between 0 and 1');
  }

  if (!Number.isInteger(game.recentLogCount) || game.recentLogCount < 1) {
    errors.push('GAME_RECENT_LOG_COUNT must be a positive integer');
  }

  if (!knownDifficulties.includes(game.defaultDifficulty)) {
    errors.push(`Unknown GAME_DEFAULT_DIFFICULTY: ${game.defaultDifficulty}`);
  }

  if (game.seed !== undefined && !Number.isInteger(game.seed)) {
    errors.push('GAME_SEED must be an integer');
  }

  if (!Number.isInteger(sessions.maxActiveSessions) || sessions.maxActiveSessions < 1) {
    errors.push('SESSION_MAX_ACTIVE must be a positive integer');
  }

  return errors;
}
