import { attempt, commit, ImmutableObject, positive, type RequirementError } from '@invariant-objects/core';
import type { Result } from 'neverthrow';

export interface PurchaseProps {
  purchaseId: number;
}

export class Purchase extends ImmutableObject<Purchase, PurchaseProps> {
  readonly purchaseId: number;

  constructor(purchaseId: number) {
    super();
    commit(positive({ purchaseId }));

    this.purchaseId = purchaseId;
  }

  static create(purchaseId: number): Result<Purchase, RequirementError> {
    return attempt(() => new Purchase(purchaseId));
  }

  withPurchaseId(purchaseId: number): Purchase {
    return this.with((draft) => {
      draft.purchaseId = purchaseId;
    });
  }

  toJSON(): PurchaseProps {
    return this.toProps();
  }

  protected toProps(): PurchaseProps {
    return { purchaseId: this.purchaseId };
  }

  protected fromProps(props: PurchaseProps): Purchase {
    return new Purchase(props.purchaseId);
  }
}
