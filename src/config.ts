import dotenv from 'dotenv';
import { ValidationError } from './utils/errors';

// 加载环境变量
dotenv.config();

export interface Config {
  app: {
    nodeEnv: 'development' | 'production' | 'test';
    logLevel: string;
    logFile?: string;
  };
  registry: {
    pluginRoot: string;
    defaultScope: string;
  };
}

type Env = Record<string, string | undefined>;

const NODE_ENVS = ['development', 'production', 'test'] as const;

function parseNodeEnv(value: string | undefined): Config['app']['nodeEnv'] {
  const env = value || 'development';
  const match = NODE_ENVS.find(candidate => candidate === env);
  if (!match) {
    throw new ValidationError(`Invalid NODE_ENV: ${env}`);
  }
  return match;
}

function parseScope(value: string | undefined): string {
  if (value === undefined) {
    return 'application';
  }
  const scope = value.trim();
  if (scope.length === 0) {
    throw new ValidationError('SERVICE_DEFAULT_SCOPE must not be empty');
  }
  return scope;
}

/**
 * 从环境变量构建配置对象
 */
export function loadConfig(env: Env = process.env): Config {
  return {
    app: {
      nodeEnv: parseNodeEnv(env.NODE_ENV),
      logLevel: env.LOG_LEVEL || 'info',
      logFile: env.LOG_FILE || undefined,
    },
    registry: {
      pluginRoot: env.SERVICE_PLUGIN_ROOT || './plugins',
      defaultScope: parseScope(env.SERVICE_DEFAULT_SCOPE),
    },
  };
}

export const config: Config = loadConfig();
