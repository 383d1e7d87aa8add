import { getAddress, type Address } from "viem";

/**
 * Map keyed by account address.
 *
 * Custom Map implementation that normalizes addresses to their checksummed form, so lookups are case-insensitive and
 * iteration yields checksummed addresses.
 */
export class AddressMap<V> extends Map<Address, V> {
  override get(address: Address): V | undefined {
    return super.get(getAddress(address));
  }

  override has(address: Address): boolean {
    return super.has(getAddress(address));
  }

  override set(address: Address, value: V): this {
    return super.set(getAddress(address), value);
  }

  override delete(address: Address): boolean {
    return super.delete(getAddress(address));
  }
}
