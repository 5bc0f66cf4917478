/**
 * Key service HTTP wire contract.
 * One endpoint: POST /api/register with a JSON name/key pair.
 */

export const REGISTER_PATH = "/api/register";

/** The key service answers GET / with 200 while it is up. */
export const HEALTH_PATH = "/";

export type RegisterRequestWire = {
  name: string;
  key: string;
};

/** Error body the key service sends with a non-2xx status. */
export type ApiErrorBody = {
  message: string;
  detail?: string | null;
};

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Builds the register body; name and key go through untouched. */
export function toRegisterRequestWire(name: string, key: string): RegisterRequestWire {
  return { name, key };
}
