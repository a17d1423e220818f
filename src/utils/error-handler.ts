/**
 * Standardized error handling utilities for the knowledge graph engine
 *
 * Provides consistent error logging, categorization and store-failure
 * wrapping across all components.
 */

import {
  KnowledgeGraphError,
  StoreError,
  isKnowledgeGraphError,
  type GraphErrorKind
} from '../core/errors.js';

/**
 * Error categories for better classification and handling
 */
export enum ErrorCategory {
  STORAGE = 'storage',
  MUTATION = 'mutation',
  TRANSFER = 'transfer',
  CONFIGURATION = 'configuration',
  SERVER = 'server'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  kind?: GraphErrorKind;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Error result for operations that can fail without aborting their caller
 */
export interface ErrorResult {
  success: false;
  error: ErrorInfo;
}

/**
 * Success result for operations
 */
export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T> = SuccessResult<T> | ErrorResult;

/**
 * Standard error handler with categorization and frequency tracking
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();

  /**
   * Handle an error with proper categorization and logging
   */
  static handle(
    category: ErrorCategory,
    error: unknown,
    context?: Record<string, unknown>
  ): ErrorInfo {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const errorInfo: ErrorInfo = {
      category,
      severity: this.severityOf(error),
      message: originalError.message,
      kind: isKnowledgeGraphError(error) ? error.kind : undefined,
      originalError,
      context,
      timestamp: new Date()
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, errorInfo.kind ?? originalError.name);

    return errorInfo;
  }

  /**
   * Run an operation and capture its failure as a result instead of throwing
   */
  static async wrapOperation<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    context?: Record<string, unknown>
  ): Promise<OperationResult<T>> {
    try {
      return { success: true, data: await operation() };
    } catch (error) {
      return { success: false, error: this.handle(category, error, context) };
    }
  }

  /**
   * Run a record store call, converting foreign failures into StoreError.
   * Engine errors pass through untouched.
   */
  static async guardStore<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof KnowledgeGraphError) {
        throw error;
      }
      throw new StoreError(operation, error);
    }
  }

  /**
   * Severity derived from the error kind; store failures are the only ones
   * that indicate something wrong outside the caller's input
   */
  static severityOf(error: unknown): ErrorSeverity {
    if (!isKnowledgeGraphError(error)) {
      return ErrorSeverity.CRITICAL;
    }
    switch (error.kind) {
      case 'store': return ErrorSeverity.HIGH;
      case 'endpoint_not_found':
      case 'duplicate_id': return ErrorSeverity.MEDIUM;
      default: return ErrorSeverity.LOW;
    }
  }

  /**
   * Log error with appropriate formatting
   */
  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${errorInfo.timestamp.toISOString()}`,
      errorInfo.kind ? `   Kind: ${errorInfo.kind}` : '',
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Track error frequency for monitoring
   */
  private static trackErrorFrequency(category: ErrorCategory, label: string): void {
    const key = `${category}:${label}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
    }
  }

  /**
   * Get error statistics for monitoring
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  /**
   * Reset error statistics
   */
  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}
