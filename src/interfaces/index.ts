export { IQueueStrategy } from "./IQueueStrategy";
export { IChatMessage, IChatSubmission, ChatMessageJSON } from "./IChatMessage";
export {
  IQueueClient,
  WireMessage,
  WireProperties,
  DeliveryHandler,
  QueueSubscription,
  QueueClientState,
  FatalErrorListener,
} from "./IQueueClient";
