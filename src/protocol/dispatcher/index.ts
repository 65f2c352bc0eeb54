export {
  EventDispatcher,
  DispatchStatus,
  type CompletionSignal,
  type DispatchResult,
  type EventHandlers,
} from "./event-dispatcher";
