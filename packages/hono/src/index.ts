export {
  secureBearerToken,
  type BearerContextVariables,
  type SecureBearerTokenOptions,
} from './bearerProtection/index.js';
export { createCaseApi, type CaseApiOptions } from './caseApi.js';
export {
  healthRouteHandler,
  processDetailsRouteHandler,
  processNumberRouteHandler,
} from './caseRoutes/index.js';
export type { CaseRecords } from './interfaces/caseRecords.js';
export {
  ProcessNumberQuerySchema,
  type ProcessNumberQuery,
} from './schemas/processNumberQuery.schema.js';
export {
  formatValidationErrors,
  type ValidationErrorBody,
  type ValidationErrorDetail,
} from './utils/validationErrors.js';
