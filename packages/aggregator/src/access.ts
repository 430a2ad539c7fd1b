/**
 * Access list for gated round reads.
 *
 * While the check is enabled only listed addresses may read; disabling
 * it opens reads to everyone.
 */

import type { Address, ReadAccessController } from "@roundfeed/types";
import { normalizeAddress } from "./address.js";

export class SimpleReadAccessController implements ReadAccessController {
  private readonly _allowed = new Set<Address>();
  private _checkEnabled: boolean;

  constructor(allowed: readonly string[] = [], checkEnabled = true) {
    for (const address of allowed) {
      this._allowed.add(normalizeAddress(address));
    }
    this._checkEnabled = checkEnabled;
  }

  get checkEnabled(): boolean {
    return this._checkEnabled;
  }

  hasAccess(caller: Address): boolean {
    if (!this._checkEnabled) return true;
    return this._allowed.has(normalizeAddress(caller));
  }

  addAccess(address: string): void {
    this._allowed.add(normalizeAddress(address));
  }

  removeAccess(address: string): void {
    this._allowed.delete(normalizeAddress(address));
  }

  enableAccessCheck(): void {
    this._checkEnabled = true;
  }

  disableAccessCheck(): void {
    this._checkEnabled = false;
  }
}
