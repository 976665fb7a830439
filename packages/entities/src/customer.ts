/**
 * Customer - named account holding an ordered list of purchases.
 *
 * Every field is checked before it is assigned: a customer either satisfies
 * all of its requirements or is never created.
 */

import {
  attempt,
  commit,
  ImmutableList,
  ImmutableObject,
  notEmpty,
  notNull,
  positive,
  type RequirementError,
} from '@invariant-objects/core';
import type { Result } from 'neverthrow';

import type { Purchase, PurchaseProps } from './purchase.js';

export interface CustomerProps {
  customerNumber: number;
  name: string;
  purchases: ImmutableList<Purchase>;
}

export interface CustomerJson {
  customerNumber: number;
  name: string;
  purchases: PurchaseProps[];
}

export class Customer extends ImmutableObject<Customer, CustomerProps> {
  readonly name: string;
  readonly customerNumber: number;
  readonly purchases: ImmutableList<Purchase>;

  constructor(name: string, customerNumber: number, purchases: Iterable<Purchase>) {
    super();
    commit(notNull({ name, purchases }), notEmpty({ name }), positive({ customerNumber }));

    this.name = name;
    this.customerNumber = customerNumber;
    this.purchases = ImmutableList.from(purchases);
  }

  static create(name: string, customerNumber: number, purchases: Iterable<Purchase>): Result<Customer, RequirementError> {
    return attempt(() => new Customer(name, customerNumber, purchases));
  }

  withName(name: string): Customer {
    return this.with((draft) => {
      draft.name = name;
    });
  }

  withCustomerNumber(customerNumber: number): Customer {
    return this.with((draft) => {
      draft.customerNumber = customerNumber;
    });
  }

  /**
   * Typically fed from the current list, e.g.
   * `customer.withPurchases(customer.purchases.add(purchase))`.
   */
  withPurchases(purchases: Iterable<Purchase>): Customer {
    return this.with((draft) => {
      draft.purchases = ImmutableList.from(purchases);
    });
  }

  toJSON(): CustomerJson {
    return {
      customerNumber: this.customerNumber,
      name: this.name,
      purchases: this.purchases.toArray().map((purchase) => purchase.toJSON()),
    };
  }

  protected toProps(): CustomerProps {
    return { customerNumber: this.customerNumber, name: this.name, purchases: this.purchases };
  }

  protected fromProps(props: CustomerProps): Customer {
    return new Customer(props.name, props.customerNumber, props.purchases);
  }
}
