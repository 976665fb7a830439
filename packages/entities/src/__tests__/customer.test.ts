import { parseRenderedRequirements, RequirementError } from '@invariant-objects/core';
import { describe, expect, it } from 'vitest';

import { Customer } from '../customer.js';
import { Purchase } from '../purchase.js';

interface CustomerInput {
  customerNumber: number;
  name: string;
  purchases: Purchase[];
}

/** Input as it arrives from an untyped source, where nulls slip past the compiler. */
function fromJson(json: string): CustomerInput {
  const input: CustomerInput = JSON.parse(json);
  return input;
}

function construct(input: CustomerInput): Customer {
  return new Customer(input.name, input.customerNumber, input.purchases);
}

function purchaseAt(customer: Customer, index: number): Purchase {
  const purchase = customer.purchases.get(index);
  if (!purchase) throw new Error(`no purchase at ${index}`);
  return purchase;
}

function createPurchases(...ids: number[]): Purchase[] {
  return ids.map((id) => new Purchase(id));
}

function captureError(action: () => unknown): RequirementError {
  try {
    action();
  } catch (error) {
    if (error instanceof RequirementError) return error;
    throw error;
  }
  throw new Error('expected a RequirementError');
}

describe('Customer construction', () => {
  it('should expose exactly the supplied values', () => {
    const purchases = createPurchases(3342, 5648, 7577);
    const customer = new Customer('Oleg', 1111, purchases);

    expect(customer.name).toBe('Oleg');
    expect(customer.customerNumber).toBe(1111);
    expect(customer.purchases.toArray()).toEqual(purchases);
  });

  it('should not alias the purchases passed in', () => {
    const purchases = createPurchases(3342);
    const customer = new Customer('Oleg', 1111, purchases);
    purchases.push(new Purchase(1));

    expect(customer.purchases.size).toBe(1);
  });

  it('should report every failing attribute at once', () => {
    const error = captureError(() => construct(fromJson('{"name":null,"customerNumber":-2,"purchases":[]}')));

    expect(error.attributes).toEqual(['name', 'customerNumber']);
    expect(error.toRecord()).toEqual({
      customerNumber: ['must-be-positive'],
      name: ['must-not-be-null', 'must-not-be-empty'],
    });
  });

  it('should report a missing purchase list alongside the other failures', () => {
    const error = captureError(() => construct(fromJson('{"name":null,"customerNumber":-2,"purchases":null}')));

    expect(error.render()).toBe(
      'name: must-not-be-null, must-not-be-empty\npurchases: must-not-be-null\ncustomerNumber: must-be-positive'
    );
    expect(parseRenderedRequirements(error.render())).toHaveLength(3);
  });

  it('should report an empty name on its own', () => {
    const error = captureError(() => new Customer('', 1111, []));

    expect(error.toRecord()).toEqual({ name: ['must-not-be-empty'] });
  });

  it('should return a Result from create', () => {
    expect(Customer.create('Oleg', 1111, [])._unsafeUnwrap().name).toBe('Oleg');
    expect(Customer.create('Oleg', 0, [])._unsafeUnwrapErr().attributes).toEqual(['customerNumber']);
  });
});

describe('Customer derivation', () => {
  const original = new Customer('Oleg', 1111, createPurchases(3342, 5648, 7577));

  it('should change only the customer number', () => {
    const renumbered = original.withCustomerNumber(555);

    expect(renumbered.customerNumber).toBe(555);
    expect(renumbered.name).toBe('Oleg');
    expect(renumbered.purchases.toArray()).toEqual(original.purchases.toArray());
    expect(original.customerNumber).toBe(1111);
    expect(renumbered).not.toBe(original);
  });

  it('should change only the name', () => {
    const renamed = original.withName('Olga');

    expect(renamed.name).toBe('Olga');
    expect(original.name).toBe('Oleg');
  });

  it('should reject a derivation that breaks a requirement', () => {
    expect(captureError(() => original.withName('')).toRecord()).toEqual({ name: ['must-not-be-empty'] });
    expect(captureError(() => original.withCustomerNumber(-1)).attributes).toEqual(['customerNumber']);
  });

  it('should append a purchase without touching the original list', () => {
    const extended = original.withPurchases(original.purchases.add(new Purchase(9000)));

    expect(extended.purchases.size).toBe(4);
    expect(purchaseAt(extended, 3).purchaseId).toBe(9000);
    expect(original.purchases.size).toBe(3);
    expect(original.purchases.toArray().map((purchase) => purchase.purchaseId)).toEqual([3342, 5648, 7577]);
  });

  it('should replace a purchase by identity at the same position', () => {
    const extended = original.withPurchases(original.purchases.add(new Purchase(9000)));
    const last = purchaseAt(extended, 3);
    const replaced = extended.withPurchases(extended.purchases.replace(last, last.withPurchaseId(9999)));

    expect(replaced.purchases.toArray().map((purchase) => purchase.purchaseId)).toEqual([3342, 5648, 7577, 9999]);
    expect(purchaseAt(replaced, 0)).toBe(purchaseAt(extended, 0));
    expect(extended.purchases.toArray().map((purchase) => purchase.purchaseId)).toEqual([3342, 5648, 7577, 9000]);
    expect(last.purchaseId).toBe(9000);
  });

  it('should clone into an equal but distinct customer', () => {
    const clone = original.deepClone();

    expect(clone).not.toBe(original);
    expect(clone.toJSON()).toEqual(original.toJSON());
  });

  it('should serialize to plain data', () => {
    const customer = new Customer('Oleg', 555, createPurchases(3342));

    expect(JSON.stringify(customer)).toBe('{"customerNumber":555,"name":"Oleg","purchases":[{"purchaseId":3342}]}');
  });
});
