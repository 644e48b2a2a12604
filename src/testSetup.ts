import { LogLevel, setLogLevel } from './utils/logger';

setLogLevel(LogLevel.SILENT);
