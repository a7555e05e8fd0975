export {
  makeQueueClient,
  type QueueClient,
  type QueueClientConfig,
  type CreateWorkerOptions,
} from './client.js';
