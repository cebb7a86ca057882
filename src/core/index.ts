/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, symbols, type LogLevel } from './Logger.js';
export { EventBus, eventBus, EventTypes, type EventType, type EventPayloadMap } from './EventBus.js';
export { Application, createApplication, VERSION, type ApplicationOptions } from './Application.js';
export { InvalidPageError, WikiApiError, ComposeFileError, ConfigError, errorMessage } from './errors.js';
