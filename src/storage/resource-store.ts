/**
 * Resource Store
 * Holds the single shared resource record behind a guarded accessor
 */

import type { ZodError } from 'zod';
import {
  DEFAULT_RESOURCE,
  RESOURCE_FIELDS,
  ResourcePatchSchema,
  ResourceSchema,
  isJsonObject,
  isResourceField,
  type Resource,
} from '../types/index.js';
import {
  badBodyParam,
  invalidField,
  missingField,
  notAnObject,
  type RequestError,
} from '../types/errors.js';

// ============================================
// Types
// ============================================

export type StoreResult =
  | { ok: true; resource: Resource }
  | { ok: false; error: RequestError };

function firstInvalidField(error: ZodError): RequestError {
  const field = error.issues[0]?.path[0];
  return invalidField(field === undefined ? 'body' : String(field));
}

// ============================================
// Resource Store
// ============================================

/**
 * Every operation runs synchronously, so a merge always finishes before
 * another request's handler can observe the record.
 */
export class ResourceStore {
  private resource: Resource;

  constructor(initial: Resource = DEFAULT_RESOURCE) {
    this.resource = { ...initial };
  }

  get(): Resource {
    return { ...this.resource };
  }

  /**
   * Apply a subset of fields onto the stored resource.
   * The whole patch is validated before anything is assigned.
   */
  merge(patch: unknown): StoreResult {
    if (!isJsonObject(patch)) {
      return { ok: false, error: notAnObject() };
    }

    if (Object.keys(patch).some((key) => !isResourceField(key))) {
      return { ok: false, error: badBodyParam() };
    }

    const parsed = ResourcePatchSchema.safeParse(patch);
    if (!parsed.success) {
      return { ok: false, error: firstInvalidField(parsed.error) };
    }

    this.resource = { ...this.resource, ...parsed.data };
    return { ok: true, resource: this.get() };
  }

  /**
   * Build a fresh resource from a body carrying every field.
   * Extra keys are dropped; the stored record is left alone.
   */
  build(input: unknown): StoreResult {
    if (!isJsonObject(input)) {
      return { ok: false, error: notAnObject() };
    }

    const missing = RESOURCE_FIELDS.find((field) => !Object.hasOwn(input, field));
    if (missing) {
      return { ok: false, error: missingField(missing) };
    }

    const parsed = ResourceSchema.safeParse(input);
    if (!parsed.success) {
      return { ok: false, error: firstInvalidField(parsed.error) };
    }

    return { ok: true, resource: parsed.data };
  }

  reset(): Resource {
    this.resource = { ...DEFAULT_RESOURCE };
    return this.get();
  }
}

// ============================================
// Singleton
// ============================================

let instance: ResourceStore | null = null;

export function getResourceStore(): ResourceStore {
  if (!instance) {
    instance = new ResourceStore();
  }
  return instance;
}
