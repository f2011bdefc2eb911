/**
 * Template registry errors
 * @module @faultline/shared/errors/template-error
 */

import { FaultlineError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * A single defect found while loading a template source
 */
export interface TemplateIssue {
  /** Template ID, or `#<index>` when the entry has no usable ID */
  templateId: string;
  /** Offending field within the entry */
  field: string;
  /** What is wrong */
  message: string;
}

/**
 * Raised when a template ID does not resolve in the registry
 */
export class TemplateNotFoundError extends FaultlineError {
  public readonly templateId: string;

  constructor(templateId: string, known: string[] = []) {
    super(`Template not found: ${templateId}`, ErrorCode.TEMPLATE_NOT_FOUND, {
      resourceType: 'template',
      resourceId: templateId,
      known,
    });
    this.name = 'TemplateNotFoundError';
    this.templateId = templateId;
  }
}

/**
 * Raised when a template source contains structural defects.
 * Lists every offending entry, not only the first.
 */
export class InvalidTemplateError extends FaultlineError {
  public readonly issues: TemplateIssue[];

  constructor(issues: TemplateIssue[], meta: ErrorMeta = {}) {
    const templates = [...new Set(issues.map(i => i.templateId))];
    super(
      `Invalid template source: ${issues.length} issue(s) in ${templates.join(', ')}`,
      ErrorCode.TEMPLATE_INVALID,
      meta,
    );
    this.name = 'InvalidTemplateError';
    this.issues = issues;
  }

  /**
   * Issues reported for one template
   */
  issuesFor(templateId: string): TemplateIssue[] {
    return this.issues.filter(i => i.templateId === templateId);
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        issues: this.issues,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

/**
 * Raised when the template source itself cannot be read or parsed
 */
export class TemplateSourceError extends FaultlineError {
  constructor(source: string, cause?: Error) {
    super(
      `Unable to read template source ${source}${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.TEMPLATE_SOURCE_UNREADABLE,
      { source },
      cause,
    );
    this.name = 'TemplateSourceError';
  }
}

export function isInvalidTemplateError(error: unknown): error is InvalidTemplateError {
  return error instanceof InvalidTemplateError;
}
