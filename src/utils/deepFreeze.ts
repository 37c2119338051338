/**
 * Freezes an object together with every nested object and array.
 *
 * @returns The same reference, now read-only at every level
 *
 * @example
 * const record = deepFreeze({ signal: { type: "hold" }, factors: ["RSI extreme"] });
 * Object.isFrozen(record.signal); // true
 */
export const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
};

export default deepFreeze;
