import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

interface EnvConfig {
  // Server
  port: number;
  nodeEnv: string;

  // File Upload
  upload: {
    maxFileSizeMB: number;
  };

  // Conversion
  conversion: {
    inputDelimiter?: string;
    outputDelimiter: string;
    keepEmptyAttributes: boolean;
    encodingCandidates: string[];
  };

  // Logging
  logging: {
    level: string;
    file: string;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  return value ? parseInt(value, 10) : defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return items.length > 0 ? items : defaultValue;
}

export const config: EnvConfig = {
  port: getEnvNumber('PORT', 3000),
  nodeEnv: getEnvVar('NODE_ENV', 'development'),

  upload: {
    maxFileSizeMB: getEnvNumber('MAX_FILE_SIZE_MB', 10),
  },

  conversion: {
    // Not trimmed, a tab delimiter must survive
    inputDelimiter: process.env.CSV_DELIMITER || undefined,
    outputDelimiter: process.env.OUTPUT_DELIMITER || ';',
    keepEmptyAttributes: getEnvBoolean('KEEP_EMPTY_ATTRIBUTES', false),
    encodingCandidates: getEnvList('ENCODING_CANDIDATES', ['utf-8', 'windows-1250']),
  },

  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: getEnvVar('LOG_FILE', 'logs/app.log'),
  },
};

export const isDevelopment = config.nodeEnv === 'development';
export const isProduction = config.nodeEnv === 'production';
export const isTest = config.nodeEnv === 'test';
