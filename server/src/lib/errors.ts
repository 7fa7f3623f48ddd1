/**
 * Typed failures for loading a relationship dataset and querying its graph.
 * Every error is thrown to the caller; nothing here is recovered internally.
 */

import type { PersonId } from '@heritage-pathfind/shared';

export type HeritageErrorCode =
  | 'MalformedRecord'
  | 'MissingField'
  | 'InvalidMetadata'
  | 'ConflictingPersonData'
  | 'UnknownIdentifier'
  | 'NoPathFound'
  | 'InvalidConfig';

export class HeritageError extends Error {
  readonly code: HeritageErrorCode;

  constructor(code: HeritageErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedRecordError extends HeritageError {
  constructor(readonly line: number, readonly reason: string) {
    super('MalformedRecord', `line ${line}: malformed record, ${reason}`);
  }
}

export class MissingFieldError extends HeritageError {
  constructor(readonly line: number, readonly field: string) {
    super('MissingField', `line ${line}: missing required field "${field}"`);
  }
}

export class InvalidMetadataError extends HeritageError {
  constructor(readonly line: number, readonly field: string, readonly value: string) {
    super('InvalidMetadata', `line ${line}: "${field}" must be a non-negative integer, got "${value}"`);
  }
}

export class ConflictingPersonDataError extends HeritageError {
  constructor(
    readonly line: number,
    readonly personId: PersonId,
    readonly field: 'name' | 'age',
    readonly existing: string,
    readonly incoming: string
  ) {
    super(
      'ConflictingPersonData',
      `line ${line}: person ${personId} has ${field} "${incoming}" but was already recorded with "${existing}"`
    );
  }
}

export type QueryRole = 'ancestor' | 'descendant';

export class UnknownIdentifierError extends HeritageError {
  constructor(readonly id: PersonId, readonly role: QueryRole) {
    super('UnknownIdentifier', `${role} ${id} not found in dataset`);
  }
}

export class NoPathFoundError extends HeritageError {
  constructor(readonly ancestorId: PersonId, readonly descendantId: PersonId) {
    super('NoPathFound', `no path found from ${ancestorId} to ${descendantId}`);
  }
}

export class ConfigError extends HeritageError {
  constructor(message: string) {
    super('InvalidConfig', message);
  }
}

export const isHeritageError = (value: unknown): value is HeritageError =>
  value instanceof HeritageError;
