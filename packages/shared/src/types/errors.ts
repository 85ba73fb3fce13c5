/**
 * Pipeline error codes
 *
 * Error code ranges:
 * - 40001-40099: Validation errors
 * - 40400-40499: Not-found errors
 * - 40900-40999: Conflict errors
 * - 50400-50499: Timeout errors
 * - 50200-50299: Publish errors
 * - 50300-50399: Storage errors
 * - 50000-50099: System errors
 */

export type ErrorCategory =
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'timeout'
  | 'publish'
  | 'storage'
  | 'system';

export interface ErrorCodeDefinition {
  code: number;
  category: ErrorCategory;
  name: string;
  description: string;
  retryable: boolean;
}

/**
 * Standardized error codes registry
 */
export const ERROR_CODES = {
  // ============================================
  // 40001-40099: Validation Errors
  // ============================================
  INVALID_PAYLOAD: {
    code: 40001,
    category: 'validation' as const,
    name: 'INVALID_PAYLOAD',
    description: 'Webhook payload failed structural validation',
    retryable: false,
  },
  UNSUPPORTED_PLATFORM: {
    code: 40002,
    category: 'validation' as const,
    name: 'UNSUPPORTED_PLATFORM',
    description: 'No normalizer is registered for the platform',
    retryable: false,
  },
  INVALID_MESSAGE: {
    code: 40003,
    category: 'validation' as const,
    name: 'INVALID_MESSAGE',
    description: 'Message content does not match its type',
    retryable: false,
  },
  MESSAGE_TOO_LONG: {
    code: 40004,
    category: 'validation' as const,
    name: 'MESSAGE_TOO_LONG',
    description: 'Message exceeds the maximum word count',
    retryable: false,
  },
  INVALID_STATUS: {
    code: 40005,
    category: 'validation' as const,
    name: 'INVALID_STATUS',
    description: 'Unknown message status',
    retryable: false,
  },
  INVALID_EVENT: {
    code: 40006,
    category: 'validation' as const,
    name: 'INVALID_EVENT',
    description: 'Event envelope failed validation',
    retryable: false,
  },

  // ============================================
  // 40400-40499: Not-Found Errors
  // ============================================
  NOT_FOUND: {
    code: 40400,
    category: 'not_found' as const,
    name: 'NOT_FOUND',
    description: 'Resource not found',
    retryable: false,
  },
  CONVERSATION_NOT_FOUND: {
    code: 40401,
    category: 'not_found' as const,
    name: 'CONVERSATION_NOT_FOUND',
    description: 'Conversation not found',
    retryable: false,
  },
  MESSAGE_NOT_FOUND: {
    code: 40402,
    category: 'not_found' as const,
    name: 'MESSAGE_NOT_FOUND',
    description: 'Message not found',
    retryable: false,
  },
  WEBHOOK_EVENT_NOT_FOUND: {
    code: 40403,
    category: 'not_found' as const,
    name: 'WEBHOOK_EVENT_NOT_FOUND',
    description: 'Webhook event not found',
    retryable: false,
  },
  ASSIGNEE_NOT_FOUND: {
    code: 40404,
    category: 'not_found' as const,
    name: 'ASSIGNEE_NOT_FOUND',
    description: 'Organization has no user to own the conversation',
    retryable: false,
  },

  // ============================================
  // 40900-40999: Conflict Errors
  // ============================================
  CONVERSATION_CONFLICT: {
    code: 40900,
    category: 'conflict' as const,
    name: 'CONVERSATION_CONFLICT',
    description: 'Active conversation could not be resolved after concurrent writes',
    retryable: true,
  },

  // ============================================
  // 50xxx: Infrastructure Errors
  // ============================================
  PROCESSING_TIMEOUT: {
    code: 50400,
    category: 'timeout' as const,
    name: 'PROCESSING_TIMEOUT',
    description: 'Operation timed out',
    retryable: true,
  },
  PUBLISH_FAILED: {
    code: 50200,
    category: 'publish' as const,
    name: 'PUBLISH_FAILED',
    description: 'Event could not be published',
    retryable: true,
  },
  STORAGE_ERROR: {
    code: 50300,
    category: 'storage' as const,
    name: 'STORAGE_ERROR',
    description: 'Storage operation failed',
    retryable: true,
  },
  INTERNAL_ERROR: {
    code: 50000,
    category: 'system' as const,
    name: 'INTERNAL_ERROR',
    description: 'Internal server error',
    retryable: true,
  },
  BATCH_FAILED: {
    code: 50001,
    category: 'system' as const,
    name: 'BATCH_FAILED',
    description: 'One or more items in the batch failed',
    retryable: true,
  },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Get error definition by error code number
 */
export function getErrorByCode(code: number): ErrorCodeDefinition | undefined {
  return Object.values(ERROR_CODES).find((e) => e.code === code);
}
