export { BaseAppError, type ErrorField } from './base-app-error';
export { BadRequestError, type BadRequestErrorCode } from './bad-request-error';
