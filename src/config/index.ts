import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

// Environment type
type Environment = 'development' | 'production' | 'test';

const parseEnvironment = (value: string | undefined): Environment => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

const nodeEnv = parseEnvironment(process.env.NODE_ENV);
const isProduction = nodeEnv === 'production';
const isDevelopment = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

export const config = {
  // Server
  port: parseInt(process.env.PORT || '8000', 10),
  nodeEnv,
  isProduction,
  isDevelopment,
  isTest,

  // FMCSA QCMobile registry
  fmcsa: {
    apiKey: process.env.FMCSA_API_KEY || '',
    baseUrl: process.env.FMCSA_BASE_URL || 'https://mobile.fmcsa.dot.gov/qc/services',
    timeoutMs: parseInt(process.env.FMCSA_TIMEOUT_MS || '10000', 10),
  },

  // Load reference table
  loads: {
    csvPath: path.resolve(process.cwd(), process.env.LOADS_CSV_PATH || 'data/loads.csv'),
  },

  // Cors
  cors: {
    origins: process.env.CORS_ORIGINS?.split(',') || [
      'http://localhost:5173',
      'http://localhost:3000',
    ],
  },
} as const;

// Configuration validation errors
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Validate required configuration
export function validateConfig(): string[] {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port <= 0) {
    errors.push('PORT must be a positive integer');
  }

  if (!Number.isInteger(config.fmcsa.timeoutMs) || config.fmcsa.timeoutMs <= 0) {
    errors.push('FMCSA_TIMEOUT_MS must be a positive integer');
  }

  if (!config.fmcsa.apiKey) {
    warnings.push('FMCSA_API_KEY not set - carrier validation will fail');
  }

  if (!fs.existsSync(config.loads.csvPath)) {
    warnings.push(`Load data file not found at ${config.loads.csvPath} - load lookups will be unavailable`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration:\n${errors.join('\n')}`);
  }

  return warnings;
}

export default config;
