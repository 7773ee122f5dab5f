import type { Memory } from "./types.js";

/** `happenedAt` order; memories of the same moment keep insertion order. */
export function byHappenedAt(order: "asc" | "desc") {
  const sign = order === "asc" ? 1 : -1;
  return (a: Memory, b: Memory): number =>
    sign * (a.happenedAt.getTime() - b.happenedAt.getTime()) ||
    a.createdAt.getTime() - b.createdAt.getTime();
}
