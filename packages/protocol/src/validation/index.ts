// Validation module - boundary checks for decoded server input

export {
  modelPayloadSchema,
  parseModelPayload,
  isPropertyGroup,
  type PayloadValidationResult,
  type PayloadValidationError,
  type PayloadValidationErrorCode,
} from './payload.js';
