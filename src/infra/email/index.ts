export {
  makeEmailClient,
  type EmailClientConfig,
  type EmailError,
  type EmailSender,
  type EmailTag,
  type SendEmailParams,
  type SendEmailResult,
} from './client.js';
