/**
 * Validate-then-construct builder. A builder produces exactly one instance;
 * calling `build()` again throws, so a built graph can never be mutated
 * through a retained builder reference.
 */
export abstract class AbstractBuilder<T> {
  private built = false;

  protected abstract validate(): void;
  protected abstract construct(): T;

  build(): T {
    if (this.built) {
      throw new Error(`${this.constructor.name}: build() may only be called once`);
    }
    this.validate();
    this.built = true;
    return this.construct();
  }
}
