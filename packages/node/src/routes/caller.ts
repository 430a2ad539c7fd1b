import type { Caller } from "@roundfeed/types";
import type { AuthContext } from "../types/auth.js";

/** The engine-side identity of an authenticated request. */
export function callerOf(auth: AuthContext): Caller {
  return { address: auth.address, kind: auth.kind };
}
