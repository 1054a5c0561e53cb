import { describe, expect, it } from "vitest";
import type { Brand } from "../brand";

type EntityID = Brand<number, "entity_id">;
type SlotIndex = Brand<number, "slot_index">;

describe("Brand", () => {
  //=========================================================
  // Runtime value preservation
  //=========================================================

  it("branded value equals its underlying primitive at runtime", () => {
    const id = 42 as EntityID;
    expect(id).toBe(42);
  });

  it("brands with the same underlying value are equal at runtime", () => {
    const id = 7 as EntityID;
    const slot = 7 as SlotIndex;
    // Branding is compile-time only
    expect(id === (slot as number)).toBe(true);
  });

  it("branded value works with typeof and arithmetic", () => {
    const id = 10 as EntityID;
    expect(typeof id).toBe("number");
    expect(id + 1).toBe(11);
  });
});
