export type Factory<T> = (container: Container) => T;

export type Provider<T> =
  | { kind: 'value'; value: T }
  | { kind: 'factory'; factory: Factory<T>; singleton: boolean; instance?: { value: T } };

/**
 * Typed registration key. Bindings live on the token, keyed by container,
 * so resolution keeps the registered type.
 */
export class Token<T> {
  private readonly providers = new WeakMap<Container, Provider<T>>();

  constructor(readonly name: string) {}

  /** @internal */
  bind(container: Container, provider: Provider<T>): void {
    this.providers.set(container, provider);
  }

  /** @internal */
  lookup(container: Container): Provider<T> | undefined {
    return this.providers.get(container);
  }

  toString(): string {
    return `Token(${this.name})`;
  }
}

export class Container {
  has<T>(token: Token<T>): boolean {
    return token.lookup(this) !== undefined;
  }

  registerValue<T>(token: Token<T>, value: T): void {
    token.bind(this, { kind: 'value', value });
  }

  register<T>(token: Token<T>, factory: Factory<T>): void {
    token.bind(this, { kind: 'factory', factory, singleton: false });
  }

  singleton<T>(token: Token<T>, factory: Factory<T>): void {
    token.bind(this, { kind: 'factory', factory, singleton: true });
  }

  resolve<T>(token: Token<T>): T {
    const provider = token.lookup(this);
    if (!provider) {
      throw new Error(`Container: no provider registered for token ${token.name}`);
    }

    if (provider.kind === 'value') {
      return provider.value;
    }

    if (provider.singleton) {
      if (!provider.instance) {
        provider.instance = { value: provider.factory(this) };
      }
      return provider.instance.value;
    }

    return provider.factory(this);
  }
}
