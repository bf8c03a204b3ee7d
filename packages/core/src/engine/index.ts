export {
  RequestStateMachine,
  type RequestState,
  type RequestStateListener,
  type RequestTransitionEvent,
} from "./request-state.js";
export {
  createRequestHandler,
  parseQuery,
  type RequestHandler,
  type RequestHandlerDeps,
} from "./handler.js";
