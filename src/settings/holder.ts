/**
 * SettingsHolder
 *
 * Mutable settings used while configuring a pipeline. Keys are
 * case-insensitive and overrides take precedence over defaults. Once the
 * owner calls lock(), every write fails; dispose() is the owner's explicit
 * teardown for stored resources.
 */

import { isDisposable } from '../utils/disposable.js';
import { SettingNotFoundError, SettingsLockedError, ValidationError } from '../utils/errors.js';
import type { ReadOnlySettings, SettingKey } from './types.js';

type KeyLike<T> = string | SettingKey<T>;

function keyName<T>(key: KeyLike<T>): string {
  return typeof key === 'string' ? key : key.key;
}

function normalize(key: string): string {
  return key.toLowerCase();
}

export class SettingsHolder implements ReadOnlySettings {
  private readonly defaults = new Map<string, unknown>();
  private readonly overrides = new Map<string, unknown>();
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  get(key: string): unknown;
  get<T>(key: SettingKey<T>): T;
  get<T>(key: KeyLike<T>): unknown {
    const name = keyName(key);
    const entry = this.lookup(name);
    if (!entry.found) {
      throw new SettingNotFoundError(name);
    }
    if (typeof key === 'string') {
      return entry.value;
    }
    const result = key.schema.safeParse(entry.value);
    if (!result.success) {
      throw new ValidationError(`Setting '${name}' does not match its schema`, result.error.format());
    }
    return result.data;
  }

  tryGet<T>(key: SettingKey<T>): T | undefined {
    const entry = this.lookup(key.key);
    if (!entry.found) {
      return undefined;
    }
    const result = key.schema.safeParse(entry.value);
    return result.success ? result.data : undefined;
  }

  getOrDefault<T>(key: SettingKey<T>): T | undefined;
  getOrDefault<T>(key: SettingKey<T>, fallback: T): T;
  getOrDefault<T>(key: SettingKey<T>, fallback?: T): T | undefined {
    if (!this.hasSetting(key)) {
      return fallback;
    }
    return this.get(key);
  }

  hasSetting<T>(key: KeyLike<T>): boolean {
    return this.lookup(keyName(key)).found;
  }

  hasExplicitValue<T>(key: KeyLike<T>): boolean {
    return this.overrides.has(normalize(keyName(key)));
  }

  /**
   * Get the value, or create, store (as override) and return it
   */
  getOrCreate<T>(key: SettingKey<T>, create: () => T): T {
    const existing = this.tryGet(key);
    if (existing !== undefined) {
      return existing;
    }
    const value = create();
    this.set(key, value);
    return value;
  }

  set(key: string, value: unknown): void;
  set<T>(key: SettingKey<T>, value: T): void;
  set<T>(key: KeyLike<T>, value: unknown): void {
    const name = keyName(key);
    this.ensureWriteEnabled(name);
    this.overrides.set(normalize(name), this.validated(key, value));
  }

  setDefault(key: string, value: unknown): void;
  setDefault<T>(key: SettingKey<T>, value: T): void;
  setDefault<T>(key: KeyLike<T>, value: unknown): void {
    const name = keyName(key);
    this.ensureWriteEnabled(name);
    this.defaults.set(normalize(name), this.validated(key, value));
  }

  /**
   * Copy defaults and overrides of another holder into this one
   */
  merge(settings: SettingsHolder): void {
    if (this.locked) {
      throw new SettingsLockedError(
        'Unable to merge settings. The settings has been locked for modifications. Move any configuration code earlier in the configuration pipeline'
      );
    }
    for (const [key, value] of settings.defaults) {
      this.defaults.set(key, value);
    }
    for (const [key, value] of settings.overrides) {
      this.overrides.set(key, value);
    }
  }

  /**
   * Prevent any further writes
   */
  lock(): void {
    this.locked = true;
  }

  /**
   * Remove all values without disposing them
   */
  clear(): void {
    if (this.locked) {
      throw new SettingsLockedError('Unable to clear settings. The settings has been locked for modifications.');
    }
    this.defaults.clear();
    this.overrides.clear();
  }

  /**
   * Dispose every stored value that holds resources, then drop all values.
   * Allowed on locked settings: teardown is the owner's responsibility.
   */
  async dispose(): Promise<void> {
    const values = [...this.defaults.values(), ...this.overrides.values()];
    this.defaults.clear();
    this.overrides.clear();
    for (const value of values) {
      if (isDisposable(value)) {
        await value.dispose();
      }
    }
  }

  private lookup(name: string): { found: boolean; value: unknown } {
    const normalized = normalize(name);
    if (this.overrides.has(normalized)) {
      return { found: true, value: this.overrides.get(normalized) };
    }
    if (this.defaults.has(normalized)) {
      return { found: true, value: this.defaults.get(normalized) };
    }
    return { found: false, value: undefined };
  }

  private validated<T>(key: KeyLike<T>, value: unknown): unknown {
    if (typeof key === 'string') {
      return value;
    }
    const result = key.schema.safeParse(value);
    if (!result.success) {
      throw new ValidationError(`Invalid value for setting '${key.key}'`, result.error.format());
    }
    return result.data;
  }

  private ensureWriteEnabled(key: string): void {
    if (this.locked) {
      throw new SettingsLockedError(
        `Unable to set the value for key: ${key}. The settings has been locked for modifications. Move any configuration code earlier in the configuration pipeline`
      );
    }
  }
}
