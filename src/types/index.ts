/**
 * Core types for the resource demo server
 */

import { z } from 'zod';

// ============================================
// Resource
// ============================================

/** Field order drives missing-field checks and response key order */
export const RESOURCE_FIELDS = ['name', 'location', 'endpoints', 'has_values'] as const;

export type ResourceField = (typeof RESOURCE_FIELDS)[number];

export const ResourceSchema = z.object({
  name: z.string(),
  location: z.string(),
  endpoints: z.number().int(),
  has_values: z.boolean(),
});

export type Resource = z.infer<typeof ResourceSchema>;

/** Subset of fields applied onto the stored resource by a merge */
export const ResourcePatchSchema = ResourceSchema.partial();

export const DEFAULT_RESOURCE: Readonly<Resource> = Object.freeze({
  name: 'example_resource',
  location: 'my_computer',
  endpoints: 2,
  has_values: true,
});

export function isResourceField(key: string): key is ResourceField {
  return (RESOURCE_FIELDS as readonly string[]).includes(key);
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// Responses
// ============================================

export interface QueryExtras {
  first: string | null;
  second: string | null;
}

export interface ResourceWithExtras {
  resource: Resource;
  extras: QueryExtras;
}

export interface ErrorBody {
  error: string;
}

export const STATUS_BODY = {
  status: 'online',
  nest: { test: 5 },
} as const;
