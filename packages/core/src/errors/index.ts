export {
  HttpError,
  NormalizationError,
  PermissionDeniedError,
  NotFoundError,
  MethodNotAllowedError,
  TemplateError,
  DynamicExecutionError,
  IndexBuildError,
} from "./catalog.js";
