import { createStore } from "zustand/vanilla";

export type ConnectionPhase = "idle" | "connecting" | "open" | "waiting" | "closed";

type ConnectionState = {
  phase: ConnectionPhase;
  // reconnects since the last successful open
  attempts: number;
  lastError: string | null;
  lastCloseCode: number | null;
  connecting: () => void;
  opened: () => void;
  failed: (message: string) => void;
  dropped: (code: number) => void;
  waiting: () => void;
  stopped: () => void;
};

export type ConnectionStore = ReturnType<typeof createConnectionStore>;

export function createConnectionStore() {
  return createStore<ConnectionState>((set) => ({
    phase: "idle",
    attempts: 0,
    lastError: null,
    lastCloseCode: null,
    connecting: () => set({ phase: "connecting" }),
    opened: () => set({ phase: "open", attempts: 0, lastError: null }),
    failed: (message) => set({ lastError: message }),
    dropped: (code) => set({ lastCloseCode: code }),
    waiting: () => set((s) => ({ phase: "waiting", attempts: s.attempts + 1 })),
    stopped: () => set({ phase: "closed" }),
  }));
}
