export interface DeepCloneable<T> {
  deepClone(): T;
}

/**
 * Base for values that never change after construction.
 *
 * Subclasses describe their state as a plain `TProps` record. A derived value
 * is made by copying that record, letting a modifier change the copy and
 * handing the result back to the subclass's validating constructor, so every
 * derived value passes the same requirements as the original did.
 */
export abstract class ImmutableObject<TSelf extends ImmutableObject<TSelf, TProps>, TProps extends object>
  implements DeepCloneable<TSelf>
{
  /** A fresh copy of the current state, owned by the caller. */
  protected abstract toProps(): TProps;

  /** Build a new value from `props` through the validating constructor. */
  protected abstract fromProps(props: TProps): TSelf;

  deepClone(): TSelf {
    return this.fromProps(this.toProps());
  }

  /**
   * Derive a new value. `modifier` only ever sees a copy of this value's
   * state; this instance is left untouched.
   *
   * @throws RequirementError when the modified state breaks a requirement
   */
  protected with(modifier: (draft: TProps) => void): TSelf {
    const draft = this.toProps();
    modifier(draft);
    return this.fromProps(draft);
  }
}
