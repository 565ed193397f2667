import { describe, test, expect, beforeEach } from "vitest";
import { Register } from "../registers.js";

describe("Register", () => {
  let register: Register;

  beforeEach(() => {
    register = new Register();
  });

  test("starts empty", () => {
    expect(register.get()).toBe("");
  });

  test("set replaces the previous content", () => {
    register.set("first\n");
    register.set("second\n");
    expect(register.get()).toBe("second\n");
  });

  test("get does not clear", () => {
    register.set("abc");
    register.get();
    expect(register.get()).toBe("abc");
  });

  test("setting an empty string empties the slot", () => {
    register.set("abc");
    register.set("");
    expect(register.get()).toBe("");
  });
});
