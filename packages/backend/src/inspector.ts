/**
 * Read-only views of the live shaping state.
 */

import type { ShapingInspector } from "@tierlink/core";
import type { IptablesMarkingBackend } from "./iptables.js";
import type { TcShaperBackend } from "./tc.js";

export class SystemInspector implements ShapingInspector {
  private readonly shaper: TcShaperBackend;
  private readonly marking: IptablesMarkingBackend;

  constructor(shaper: TcShaperBackend, marking: IptablesMarkingBackend) {
    this.shaper = shaper;
    this.marking = marking;
  }

  describeQdiscs(): Promise<string> {
    return this.shaper.show("qdisc");
  }

  describeClasses(): Promise<string> {
    return this.shaper.show("class");
  }

  describeFilters(): Promise<string> {
    return this.shaper.show("filter");
  }

  describeMarkRules(): Promise<string> {
    return this.marking.listRules();
  }

  /** Mark rules with packet and byte counters */
  describeMarkCounters(): Promise<string> {
    return this.marking.listRules(true);
  }
}

export interface StateDumpSection {
  readonly title: string;
  readonly body: string;
}

/**
 * Collect every listing the inspector offers, in a fixed order.
 */
export async function collectStateDump(inspector: ShapingInspector): Promise<StateDumpSection[]> {
  return [
    { title: "Qdiscs", body: await inspector.describeQdiscs() },
    { title: "Classes", body: await inspector.describeClasses() },
    { title: "Filters", body: await inspector.describeFilters() },
    { title: "Mark rules", body: await inspector.describeMarkRules() },
  ];
}

export function formatStateDump(sections: readonly StateDumpSection[], capturedAt: Date): string {
  const lines = [`# Shaping state captured ${capturedAt.toISOString()}`];
  for (const section of sections) {
    lines.push("", `## ${section.title}`, section.body.trimEnd());
  }
  return `${lines.join("\n")}\n`;
}
