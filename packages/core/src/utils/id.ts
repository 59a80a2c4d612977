// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a short unique ID, optionally prefixed ("reg_…", "src_…"). */
export function generateId(prefix?: string): string {
  const id = nanoid(12);
  return prefix ? `${prefix}_${id}` : id;
}
