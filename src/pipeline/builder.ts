/**
 * Object Builder
 *
 * The pipeline instantiates behaviors through an ObjectBuilder. Applications
 * usually adapt their own container to this interface; DefaultBuilder is a
 * small factory registry that is enough for tests, demos and simple hosts.
 */

import { isDisposable } from '../utils/disposable.js';
import { ConfigurationError } from '../utils/errors.js';

export type Constructor<T> = new (...args: never[]) => T;

export type Factory<T> = (builder: ObjectBuilder) => T;

export interface ObjectBuilder {
  /** Create (or resolve) one instance of the type */
  build<T>(type: Constructor<T>): T;
  /** Create every instance registered for the type */
  buildAll<T>(type: Constructor<T>): T[];
  /** Builder inheriting this one's registrations */
  createChildBuilder(): ObjectBuilder;
  /** Release an instance created by this builder */
  release(instance: unknown): Promise<void>;
}

/**
 * DefaultBuilder - factory registry with parent/child scoping
 *
 * Types without a registered factory are constructed with `new type()`.
 */
export class DefaultBuilder implements ObjectBuilder {
  private factories = new Map<Constructor<unknown>, Factory<unknown>[]>();

  constructor(private readonly parent?: DefaultBuilder) {}

  /**
   * Register a factory for a type. Later registrations win for build();
   * buildAll() returns all of them in registration order.
   */
  register<T>(type: Constructor<T>, factory: Factory<T>): this {
    const existing = this.factories.get(type);
    if (existing) {
      existing.push(factory);
    } else {
      this.factories.set(type, [factory]);
    }
    return this;
  }

  build<T>(type: Constructor<T>): T {
    const factory = this.findFactory(type);
    if (!factory) {
      return new type();
    }
    return this.checked(type, factory(this));
  }

  buildAll<T>(type: Constructor<T>): T[] {
    const factories = this.collectFactories(type);
    if (factories.length === 0) {
      return [new type()];
    }
    return factories.map((factory) => this.checked(type, factory(this)));
  }

  createChildBuilder(): DefaultBuilder {
    return new DefaultBuilder(this);
  }

  async release(instance: unknown): Promise<void> {
    if (isDisposable(instance)) {
      await instance.dispose();
    }
  }

  private findFactory(type: Constructor<unknown>): Factory<unknown> | undefined {
    const local = this.factories.get(type);
    if (local && local.length > 0) {
      return local[local.length - 1];
    }
    return this.parent?.findFactory(type);
  }

  private collectFactories(type: Constructor<unknown>): Factory<unknown>[] {
    const inherited = this.parent?.collectFactories(type) ?? [];
    return [...inherited, ...(this.factories.get(type) ?? [])];
  }

  private checked<T>(type: Constructor<T>, instance: unknown): T {
    if (!(instance instanceof type)) {
      throw new ConfigurationError(`Factory registered for '${type.name}' returned an instance of another type`);
    }
    return instance;
  }
}
