/**
 * Settings Types
 *
 * Settings are a two-layer key/value store (defaults and overrides) read by
 * step enablement predicates. Typed keys carry a Zod schema so reads return
 * validated values.
 */

import type { z } from 'zod';

export interface SettingKey<T> {
  readonly key: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Define a typed setting key
 */
export function defineSetting<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): SettingKey<T> {
  return Object.freeze({ key, schema });
}

export interface ReadOnlySettings {
  /** Get a raw value; throws SettingNotFoundError if absent */
  get(key: string): unknown;
  /** Get a typed value; throws if absent or invalid */
  get<T>(key: SettingKey<T>): T;

  /** Typed value, or undefined if absent or not matching the schema */
  tryGet<T>(key: SettingKey<T>): T | undefined;

  /** Typed value, or the fallback (undefined without one) if absent */
  getOrDefault<T>(key: SettingKey<T>): T | undefined;
  getOrDefault<T>(key: SettingKey<T>, fallback: T): T;

  /** True if the key has an override or a default */
  hasSetting<T>(key: string | SettingKey<T>): boolean;

  /** True if the key has an override */
  hasExplicitValue<T>(key: string | SettingKey<T>): boolean;
}
