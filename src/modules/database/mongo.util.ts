import { mongo, Types } from 'mongoose';

export function isObjectId(id: string): boolean {
  return Types.ObjectId.isValid(id) && /^[0-9a-fA-F]{24}$/.test(id);
}

export function toObjectId(id: string): Types.ObjectId {
  return new Types.ObjectId(id);
}

export function toIdString(
  id: Types.ObjectId | null | undefined,
): string | null {
  return id ? id.toString() : null;
}

/**
 * Check for MongoDB duplicate key error
 */
export function isDuplicateKeyError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 11000
  );
}

export function hasErrorLabel(error: unknown, label: string): boolean {
  return error instanceof mongo.MongoError && error.hasErrorLabel(label);
}

/**
 * Errors after which the whole transaction may be replayed: write
 * conflicts on a locked document, and duplicate keys from two
 * transactions upserting the same seat row.
 */
export function isTransientTransactionError(error: unknown): boolean {
  return (
    hasErrorLabel(error, 'TransientTransactionError') ||
    isDuplicateKeyError(error)
  );
}

/**
 * Any error raised by the driver or the server, as opposed to our own.
 */
export function isMongoError(error: unknown): boolean {
  return error instanceof mongo.MongoError;
}
