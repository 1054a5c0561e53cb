import { describe, expect, it } from "vitest";
import { AppError, ECSError, ECS_ERROR, is_ecs_error } from "../error";

describe("ECSError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE);
    expect(err.category).toBe(ECS_ERROR.ENTITY_NOT_ALIVE);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new ECSError(ECS_ERROR.EMPTY_QUERY);
    expect(err.message).toBe("EMPTY_QUERY");
  });

  it("uses provided message and context when given", () => {
    const err = new ECSError(
      ECS_ERROR.QUERY_ACCESS_CONFLICT,
      "conflict on Position",
      { component: "Position" },
    );
    expect(err.message).toBe("conflict on Position");
    expect(err.context).toEqual({ component: "Position" });
  });

  it("is operational and named ECSError", () => {
    const err = new ECSError(ECS_ERROR.INVALID_COMPONENT);
    expect(err.is_operational).toBe(true);
    expect(err.name).toBe("ECSError");
  });

  it("context is undefined when not provided", () => {
    expect(new ECSError(ECS_ERROR.EMPTY_QUERY).context).toBeUndefined();
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError and Error", () => {
    const err = new ECSError(ECS_ERROR.DUPLICATE_BUNDLE_COMPONENT);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  it("all ECS_ERROR enum members are distinct strings", () => {
    const values = Object.values(ECS_ERROR);
    expect(new Set(values).size).toBe(values.length);
  });

  //=========================================================
  // is_ecs_error guard
  //=========================================================

  it("is_ecs_error returns true for ECSError instances", () => {
    expect(is_ecs_error(new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE))).toBe(true);
  });

  it("is_ecs_error returns false for anything else", () => {
    expect(is_ecs_error(new Error("plain"))).toBe(false);
    expect(is_ecs_error(null)).toBe(false);
    expect(is_ecs_error("string")).toBe(false);
    expect(is_ecs_error({})).toBe(false);
  });
});
