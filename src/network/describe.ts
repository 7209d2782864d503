import type { BooleanNetwork } from "./model.js";

/** Human readable listing of every node's parents and truth table. */
export function describeNetwork(network: BooleanNetwork): string {
  const lines: string[] = [`The network has ${network.nodeCount} nodes:`];
  network.nodes.forEach((node, index) => {
    lines.push("");
    lines.push(`Node ${index}:`);
    if (node.parents.length === 0) {
      lines.push("  no parents (value is carried over)");
    } else {
      lines.push(`  parents: ${node.parents.join(", ")}`);
    }
    lines.push(`  truth table: [${node.truthTable.map((entry) => (entry ? 1 : 0)).join(", ")}]`);
  });
  return lines.join("\n");
}
