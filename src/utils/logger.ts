
import chalk from 'chalk';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
  SILENT = 4
}

let currentLogLevel: LogLevel = LogLevel.INFO;

function setLogLevel(level: LogLevel) {
  currentLogLevel = level;
}

function parseLogLevel(name: string): LogLevel {
  switch (name.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARNING;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

function getTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').slice(0, 19);
}

function logDebug(message: string) {
  if (currentLogLevel <= LogLevel.DEBUG) {
    console.log(chalk.gray(`[${getTimestamp()}] [DEBUG] ${message}`));
  }
}
function logInfo(message: string) {
  if (currentLogLevel <= LogLevel.INFO) {
    console.log(chalk.blue(`[${getTimestamp()}] [INFO] ${message}`));
  }
}
function logWarning(message: string) {
  if (currentLogLevel <= LogLevel.WARNING) {
    console.log(chalk.yellow(`[${getTimestamp()}] [WARN] ${message}`));
  }
}
function logError(message: string) {
  if (currentLogLevel <= LogLevel.ERROR) {
    console.error(chalk.red(`[${getTimestamp()}] [ERROR] ${message}`));
  }
}


export {LogLevel, setLogLevel, parseLogLevel, logDebug, logInfo, logWarning, logError}
