/**
 * Shared type definitions for the podmig node agent.
 * Minimal interfaces so the coordinator stays decoupled from the pod runtime.
 */

// --- Logging ---

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Pods ---

export type PodPhase =
  | "Pending"
  | "Running"
  | "Succeeded"
  | "Failed"
  | "Unknown";

const POD_PHASES = new Set<string>(["Pending", "Running", "Succeeded", "Failed", "Unknown"]);

/** Runtime check for PodPhase. */
export function isPodPhase(v: unknown): v is PodPhase {
  return typeof v === "string" && POD_PHASES.has(v);
}

export interface Pod {
  uid: string;
  name: string;
  namespace: string;
  phase: PodPhase;
  /** Container names, in declaration order. */
  containers: string[];
  finalizers: string[];
}
