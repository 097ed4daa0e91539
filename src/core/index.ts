export { TelegramClient, fetchUpdates, type TelegramClientConfig } from './telegram-client.js';
export { parseUpdatesResponse, type Update, type Message, type MessageEntity, type UrlEntity, type AnnotationEntity } from './telegram-schema.js';
export { extractURL } from './url-extractor.js';
export { checkLatestMessage, exitCodeFor, buildNotificationRequest, type LinkCheckDeps, type LinkCheckOutcome } from './link-check.js';
export { loadConfig, type AppConfig } from './config.js';
export * from './errors.js';
export * from './toast/index.js';
