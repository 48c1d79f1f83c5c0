export type { ChannelDriver, ChannelDrivers, DeliveryTarget } from './types.js';
export { BaseChannelDriver, type ChannelDriverDeps, type SendOutcome } from './base.js';
export { InAppChannelDriver } from './in-app.js';
export {
  EmailChannelDriver,
  SmtpEmailTransport,
  classifySmtpError,
  deliverableAddress,
  type EmailChannelDeps,
  type EmailMessage,
  type EmailSendResult,
  type EmailTransport,
  type SmtpTransportConfig,
} from './email.js';
export {
  TelegramChannelDriver,
  BotApiTelegramTransport,
  classifyBotApiFailure,
  type BotApiConfig,
  type TelegramChannelDeps,
  type TelegramSendResult,
  type TelegramTransport,
} from './telegram.js';
export { TokenBucket, type TakeResult, type TokenBucketConfig } from './rate-limiter.js';
