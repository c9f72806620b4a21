/**
 * Audit columns carried by every stored record.
 */
export interface AuditFields {
  readonly createdAt: Date;
  readonly updatedAt: Date | null;
  readonly createdBy: number | null;
  readonly updatedBy: number | null;
  readonly isActive: boolean;
}

/** A record as it comes back from storage. */
export type Persisted<T> = T & AuditFields & { readonly id: number };

/** A record about to be inserted: storage assigns the id and timestamps. */
export type NewRecord<T> = T & { readonly createdBy: number };

/**
 * Copy every field the patch actually carries onto the current value.
 * `undefined` means "not provided" and keeps the current value; `null` is a
 * real value and clears a nullable field.
 */
export function mergeDefined<T extends object>(current: T, patch: Partial<T>): T {
  const next: T = { ...current };
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) {
      next[key] = value;
    }
  }
  return next;
}
