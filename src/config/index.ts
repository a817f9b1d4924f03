import dotenv from 'dotenv';
dotenv.config();

export type EmphasisStyle = 'bold' | 'italic';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface IncipitDefaults {
  wordCount: number;
  emphasisStyle: EmphasisStyle;
  applyCitationStyle: boolean;
}

interface Config {
  nodeEnv: string;
  version: string;
  logLevel: LogLevel;
  incipit: IncipitDefaults;
  fingerprintCacheSize: number;
  maxXmlSize: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(l => l === value?.toLowerCase());
  return level ?? 'info';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  version: process.env.npm_package_version || '1.0.0',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  incipit: {
    wordCount: parsePositiveInt(process.env.INCIPIT_WORD_COUNT, 3),
    emphasisStyle: process.env.INCIPIT_EMPHASIS === 'italic' ? 'italic' : 'bold',
    applyCitationStyle: process.env.INCIPIT_APPLY_CITATION_STYLE !== 'false',
  },
  fingerprintCacheSize: parsePositiveInt(process.env.FINGERPRINT_CACHE_SIZE, 512),
  // 10MB max XML part size
  maxXmlSize: parsePositiveInt(process.env.MAX_XML_MEMORY_SIZE, 10485760),
};

export default config;
