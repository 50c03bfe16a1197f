import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { config } from '../config';
import { formatDate } from './helpers';

const logsDir = path.join(process.cwd(), 'logs');
const writeFiles = config.app.nodeEnv !== 'test';

// Ensure logs directory exists
if (writeFiles && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `${timestamp} [${level}]: ${message} ${metaStr}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: !writeFiles,
  }),
];

if (writeFiles) {
  transports.push(
    // Error log file
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    // Combined log file
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// Create logger instance
export const logger = winston.createLogger({
  level: config.app.logLevel,
  transports,
});

// Create child loggers for specific modules
export const createModuleLogger = (moduleName: string) => {
  return logger.child({ module: moduleName });
};

function aiDebugDir(): string {
  const debugDir = path.join(logsDir, 'ai', formatDate(new Date()));
  if (!fs.existsSync(debugDir)) {
    fs.mkdirSync(debugDir, { recursive: true });
  }
  return debugDir;
}

// Debug file logger for AI
export const logAIPrompt = (task: string, prompt: string) => {
  if (!config.debug.logAIPrompts || !writeFiles) return;

  const filename = path.join(aiDebugDir(), `prompt-${Date.now()}.txt`);
  fs.writeFileSync(filename, `Task: ${task}\n\n${prompt}`);

  logger.debug(`AI prompt logged to ${filename}`);
};

export const logAIResponse = (task: string, response: unknown) => {
  if (!config.debug.logAIResponses || !writeFiles) return;

  const filename = path.join(aiDebugDir(), `response-${Date.now()}.json`);
  fs.writeFileSync(
    filename,
    JSON.stringify({ task, response, timestamp: new Date().toISOString() }, null, 2)
  );

  logger.debug(`AI response logged to ${filename}`);
};

export default logger;
