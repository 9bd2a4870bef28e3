export { GlobalExceptionFilter } from "./http-exception.filter";
export type { ApiErrorResponse } from "./http-exception.filter";
