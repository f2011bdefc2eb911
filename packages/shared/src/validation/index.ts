/**
 * Validation exports
 * @module @faultline/shared/validation
 */

export {
  validateFaultName,
  validateNamespace,
  validateTtl,
  validateLabels,
  validateSelector,
  validateParameterValue,
  validateParameters,
  isParameterValue,
} from './request-validation';

export {
  validateParameterSpec,
  validateTemplateEntry,
  type TemplateEntry,
} from './template-validation';
