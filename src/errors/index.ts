export {
  AppError,
  BadRequestError,
  InvalidInputError,
  NotFoundError,
  AgentNotFoundError,
  SystemNotReadyError,
  ConfigurationError,
  isAppError,
  toError,
} from "./app-error.js";
export type { ErrorCode, SerializedError } from "./app-error.js";
