/**
 * Error taxonomy of the planner core
 * Structural errors abort an operation; per-item errors are skipped by the caller
 */

import type { MandatoryCategory } from '../types/index.js';

export class EmptyCatalogError extends Error {
  readonly category: MandatoryCategory;

  constructor(category: MandatoryCategory) {
    super(`Cannot generate a plan: the catalog has no "${category}" items`);
    this.name = 'EmptyCatalogError';
    this.category = category;
  }
}

export class MissingWeekdayColumnError extends Error {
  constructor() {
    super('No weekday columns (Mon, Tue, Wed, Thu, Fri) found in the sheet');
    this.name = 'MissingWeekdayColumnError';
  }
}

export class MissingPlanSheetError extends Error {
  constructor() {
    super('No sheet found: the workbook needs a sheet named "Lunch" or "Dinner"');
    this.name = 'MissingPlanSheetError';
  }
}

export class InvalidMenuSheetError extends Error {
  constructor() {
    super('The first column of the menu sheet must be titled "Menu"');
    this.name = 'InvalidMenuSheetError';
  }
}

export type ClassificationFailureReason = 'auth' | 'service' | 'malformed';

export class ClassificationFailure extends Error {
  readonly menuName: string;
  readonly reason: ClassificationFailureReason;

  constructor(menuName: string, reason: ClassificationFailureReason, message: string, options?: { cause?: unknown }) {
    super(`Classification of "${menuName}" failed (${reason}): ${message}`, options);
    this.name = 'ClassificationFailure';
    this.menuName = menuName;
    this.reason = reason;
  }
}

export class CatalogWriteFailure extends Error {
  readonly menuName: string;

  constructor(menuName: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to write menu "${menuName}" to the catalog${detail}`, options);
    this.name = 'CatalogWriteFailure';
    this.menuName = menuName;
  }
}

// Errors raised by the shape of user input rather than by the server
export const isStructuralError = (error: unknown): error is Error =>
  error instanceof EmptyCatalogError ||
  error instanceof MissingWeekdayColumnError ||
  error instanceof MissingPlanSheetError ||
  error instanceof InvalidMenuSheetError;
