import { describe, test, expect } from "vitest";
import { createActor } from "xstate";
import { viMachine, modeOf, pendingOf } from "../ViMachine.js";

function createViActor() {
  return createActor(viMachine).start();
}

describe("ViMachine", () => {
  describe("initial state", () => {
    test("starts idle in navigation", () => {
      const actor = createViActor();
      expect(actor.getSnapshot().value).toEqual({ navigation: "idle" });
    });

    test("starts with operator null", () => {
      const actor = createViActor();
      expect(actor.getSnapshot().context.operator).toBeNull();
    });

    test("reports navigation mode with nothing pending", () => {
      const snapshot = createViActor().getSnapshot();
      expect(modeOf(snapshot)).toBe("navigation");
      expect(pendingOf(snapshot)).toBeNull();
    });
  });

  describe("mode transitions", () => {
    test("INSERT enters insertion", () => {
      const actor = createViActor();
      actor.send({ type: "INSERT" });
      expect(actor.getSnapshot().value).toBe("insertion");
      expect(modeOf(actor.getSnapshot())).toBe("insertion");
    });

    test("ESCAPE leaves insertion", () => {
      const actor = createViActor();
      actor.send({ type: "INSERT" });
      actor.send({ type: "ESCAPE" });
      expect(actor.getSnapshot().value).toEqual({ navigation: "idle" });
    });

    test("NAVIGATE leaves insertion", () => {
      const actor = createViActor();
      actor.send({ type: "INSERT" });
      actor.send({ type: "NAVIGATE" });
      expect(modeOf(actor.getSnapshot())).toBe("navigation");
    });

    test("NAVIGATE twice is the same as once", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "delete" });
      actor.send({ type: "NAVIGATE" });
      const once = actor.getSnapshot().value;
      actor.send({ type: "NAVIGATE" });
      expect(actor.getSnapshot().value).toEqual(once);
      expect(pendingOf(actor.getSnapshot())).toBeNull();
    });

    test("RESET is ignored in insertion", () => {
      const actor = createViActor();
      actor.send({ type: "INSERT" });
      actor.send({ type: "RESET" });
      expect(actor.getSnapshot().value).toBe("insertion");
    });

    test("INSERT clears a pending operator", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "yank" });
      actor.send({ type: "INSERT" });
      expect(actor.getSnapshot().context.operator).toBeNull();
    });
  });

  describe("pending compositions", () => {
    test("operator waits for a second key", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "delete" });
      expect(actor.getSnapshot().value).toEqual({ navigation: "operatorPending" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "operator", operator: "delete" });
    });

    test("same operator twice completes the pair", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "yank" });
      actor.send({ type: "OPERATOR", operator: "yank" });
      expect(actor.getSnapshot().value).toEqual({ navigation: "idle" });
      expect(actor.getSnapshot().context.operator).toBeNull();
    });

    test("different operator replaces the pending one", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "delete" });
      actor.send({ type: "OPERATOR", operator: "yank" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "operator", operator: "yank" });
    });

    test("G waits for a second g", () => {
      const actor = createViActor();
      actor.send({ type: "G" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "g" });
    });

    test("gg completes", () => {
      const actor = createViActor();
      actor.send({ type: "G" });
      actor.send({ type: "G" });
      expect(pendingOf(actor.getSnapshot())).toBeNull();
    });

    test("G after an operator drops the operator", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "delete" });
      actor.send({ type: "G" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "g" });
      expect(actor.getSnapshot().context.operator).toBeNull();
    });

    test("operator after G drops the g", () => {
      const actor = createViActor();
      actor.send({ type: "G" });
      actor.send({ type: "OPERATOR", operator: "delete" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "operator", operator: "delete" });
    });

    test("REPLACE waits for the replacement character", () => {
      const actor = createViActor();
      actor.send({ type: "REPLACE" });
      expect(actor.getSnapshot().value).toEqual({ navigation: "replacePending" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "replace" });
    });

    test("REPLACE after an operator drops the operator", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "delete" });
      actor.send({ type: "REPLACE" });
      expect(pendingOf(actor.getSnapshot())).toEqual({ kind: "replace" });
      expect(actor.getSnapshot().context.operator).toBeNull();
    });

    test("RESET cancels a pending replace", () => {
      const actor = createViActor();
      actor.send({ type: "REPLACE" });
      actor.send({ type: "RESET" });
      expect(actor.getSnapshot().value).toEqual({ navigation: "idle" });
    });

    test("REPLACE is ignored in insertion", () => {
      const actor = createViActor();
      actor.send({ type: "INSERT" });
      actor.send({ type: "REPLACE" });
      expect(actor.getSnapshot().value).toBe("insertion");
    });

    test("RESET clears whatever is pending", () => {
      const actor = createViActor();
      actor.send({ type: "G" });
      actor.send({ type: "RESET" });
      expect(pendingOf(actor.getSnapshot())).toBeNull();

      actor.send({ type: "OPERATOR", operator: "delete" });
      actor.send({ type: "RESET" });
      expect(pendingOf(actor.getSnapshot())).toBeNull();
    });

    test("ESCAPE in navigation clears pending and stays in navigation", () => {
      const actor = createViActor();
      actor.send({ type: "OPERATOR", operator: "yank" });
      actor.send({ type: "ESCAPE" });
      expect(actor.getSnapshot().value).toEqual({ navigation: "idle" });
    });
  });
});
