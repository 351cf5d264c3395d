import { InviteErrorCode } from '@tenantry/core';

export class PermissionDeniedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PermissionDeniedError';
  }
}

export class InviteValidationError extends Error {
  readonly code: InviteErrorCode;

  constructor(code: InviteErrorCode, message: string) {
    super(message);
    this.name = 'InviteValidationError';
    this.code = code;
  }
}

/**
 * A storage-level unique constraint rejected a write, usually because a
 * concurrent request got there first.
 */
export class ConflictError extends Error {
  readonly constraint: string;

  constructor(constraint: string, detail?: string) {
    super(`Conflicting write rejected by ${constraint}${detail ? `: ${detail}` : ''}`);
    this.name = 'ConflictError';
    this.constraint = constraint;
  }
}

export class NotFoundError extends Error {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}
