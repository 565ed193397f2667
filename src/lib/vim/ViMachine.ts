import { setup, assign, type SnapshotFrom } from "xstate";
import type { Operator, Pending, ViMode } from "./types.js";

// Events the vi machine can receive
export type ViMachineEvent =
  | { type: "OPERATOR"; operator: Operator }
  | { type: "G" }
  | { type: "REPLACE" }
  | { type: "INSERT" }
  | { type: "ESCAPE" }
  | { type: "NAVIGATE" }
  | { type: "RESET" };

// Context stored in the state machine
interface ViContext {
  operator: Operator | null;
}

/**
 * Mode machine.
 *
 * Pending compositions are substates of navigation, so a pending operator,
 * a pending `g` and a pending `r` can never be set at the same time. Any
 * event that does not complete the composition lands back in `idle`.
 */
export const viMachine = setup({
  types: {
    context: {} as ViContext,
    events: {} as ViMachineEvent,
  },
  actions: {
    setOperator: assign({
      operator: ({ event }) => {
        if (event.type !== "OPERATOR") return null;
        return event.operator;
      },
    }),
    clearOperator: assign({
      operator: () => null,
    }),
  },
  guards: {
    isSameOperator: ({ context, event }) => {
      if (event.type !== "OPERATOR") return false;
      return context.operator === event.operator;
    },
  },
}).createMachine({
  id: "vi",
  initial: "navigation",
  context: {
    operator: null,
  },
  states: {
    navigation: {
      initial: "idle",
      on: {
        INSERT: {
          target: "insertion",
          actions: "clearOperator",
        },
        ESCAPE: {
          target: ".idle",
          actions: "clearOperator",
        },
        NAVIGATE: {
          target: ".idle",
          actions: "clearOperator",
        },
        RESET: {
          target: ".idle",
          actions: "clearOperator",
        },
        // r waits for the replacement character
        REPLACE: {
          target: ".replacePending",
          actions: "clearOperator",
        },
      },
      states: {
        idle: {
          on: {
            OPERATOR: {
              target: "operatorPending",
              actions: "setOperator",
            },
            G: {
              target: "gPending",
            },
          },
        },
        operatorPending: {
          on: {
            OPERATOR: [
              {
                // dd, yy - completes the pair
                guard: "isSameOperator",
                target: "idle",
                actions: "clearOperator",
              },
              {
                // Different operator - switch to new one
                actions: "setOperator",
              },
            ],
            G: {
              target: "gPending",
              actions: "clearOperator",
            },
          },
        },
        gPending: {
          on: {
            // gg
            G: {
              target: "idle",
            },
            OPERATOR: {
              target: "operatorPending",
              actions: "setOperator",
            },
          },
        },
        replacePending: {},
      },
    },
    insertion: {
      on: {
        ESCAPE: {
          target: "navigation",
        },
        NAVIGATE: {
          target: "navigation",
        },
      },
    },
  },
});

export type ViMachine = typeof viMachine;
export type ViSnapshot = SnapshotFrom<ViMachine>;

export function modeOf(snapshot: ViSnapshot): ViMode {
  return snapshot.matches("insertion") ? "insertion" : "navigation";
}

export function pendingOf(snapshot: ViSnapshot): Pending {
  if (snapshot.matches({ navigation: "gPending" })) {
    return { kind: "g" };
  }
  if (snapshot.matches({ navigation: "replacePending" })) {
    return { kind: "replace" };
  }
  const operator = snapshot.context.operator;
  if (snapshot.matches({ navigation: "operatorPending" }) && operator) {
    return { kind: "operator", operator };
  }
  return null;
}
