export { LoggerModule } from './logger.module';
export { LoggerService, LogLevel, type LogContext, type LogEntry } from './logger.service';
