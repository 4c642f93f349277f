// Validation middleware
export {
  isValidUUID,
  validateUUIDParam,
  validateRequiredFields,
  validateSaveBody,
  validateExportBody
} from './validation';

// Error responses
export { sendError } from './errorResponse';
