import { BreakCalcError } from "./errors";

export function computePressure(force_lbf: number, contactArea_in2: number): number {
  if (!Number.isFinite(contactArea_in2) || contactArea_in2 <= 0) {
    throw new BreakCalcError(
      "INVALID_CONTACT_AREA",
      `contact area must be > 0 in^2 (got ${contactArea_in2})`,
    );
  }
  return force_lbf / contactArea_in2;
}
