/**
 * Request validator service
 * Checks a fault request against the template it names
 * @module @faultline/core/services/request-validator
 */

import type {
  FaultRequest,
  FaultTemplate,
  ValidatedRequest,
  ValidationErrorDetail,
  ValidationResult,
} from '@faultline/shared';
import {
  DEFAULT_ENGINE_CONFIG,
  ValidationError,
  deepClone,
  invalidResult,
  validResult,
  validateFaultName,
  validateLabels,
  validateNamespace,
  validateParameters,
  validateSelector,
  validateTtl,
} from '@faultline/shared';

/**
 * Request validator options
 */
export interface RequestValidatorOptions {
  /** Upper bound for ttlSeconds */
  maxTtlSeconds?: number;
}

/**
 * Validates requests. Never stops at the first violation.
 */
export class RequestValidator {
  private readonly maxTtlSeconds: number;

  constructor(options: RequestValidatorOptions = {}) {
    this.maxTtlSeconds = options.maxTtlSeconds ?? DEFAULT_ENGINE_CONFIG.maxTtlSeconds;
  }

  validate(request: FaultRequest, template: FaultTemplate): ValidationResult<ValidatedRequest> {
    const errors: ValidationErrorDetail[] = [];
    const push = (detail: ValidationErrorDetail | null): void => {
      if (detail) errors.push(detail);
    };

    if (request.templateId !== template.templateId) {
      errors.push({
        field: 'templateId',
        message: `Request names ${request.templateId} but was checked against ${template.templateId}`,
        rule: 'match',
      });
    }

    if (request.templateVersion !== undefined && request.templateVersion !== template.version) {
      errors.push({
        field: 'templateVersion',
        message: `Template ${template.templateId} is at version ${template.version}`,
        rule: 'version',
        expected: String(template.version),
        received: request.templateVersion,
      });
    }

    const metadata = request.metadata;
    push(validateFaultName(metadata.name));
    push(validateNamespace(metadata.namespace));
    push(validateTtl(metadata.ttlSeconds, this.maxTtlSeconds));
    errors.push(...validateLabels(metadata.labels, 'metadata.labels'));

    errors.push(...validateSelector(request.spec.selector));

    const { errors: parameterErrors, resolved } = validateParameters(template.parameters, request.spec.parameters);
    errors.push(...parameterErrors);

    if (errors.length > 0) {
      return invalidResult(ValidationError.multiple(errors, {
        resourceType: 'fault-request',
        templateId: template.templateId,
      }));
    }

    const validated: ValidatedRequest = {
      request: deepClone(request),
      templateVersion: template.version,
      parameters: resolved,
    };
    if (metadata.ttlSeconds !== undefined) {
      validated.ttlSeconds = metadata.ttlSeconds;
    }
    return validResult(validated);
  }
}

/**
 * Create a request validator
 */
export function createRequestValidator(options?: RequestValidatorOptions): RequestValidator {
  return new RequestValidator(options);
}
