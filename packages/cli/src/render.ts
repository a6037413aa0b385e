/**
 * Terminal rendering for status, monitor and self-test output.
 *
 * @module cli/render
 */

import {
  type ClassTree,
  type Counter,
  isKnown,
  type SelfTestReport,
  type ServiceCurve,
  type StatsSnapshot,
} from "@tierlink/core";
import chalk from "chalk";
import { table } from "table";

const UNKNOWN_CELL = "?";

export function formatCounter(value: Counter): string {
  return isKnown(value) ? String(value) : UNKNOWN_CELL;
}

export function formatBytes(value: Counter): string {
  if (!isKnown(value)) {
    return UNKNOWN_CELL;
  }
  if (value < 1024) {
    return `${value} B`;
  }
  if (value < 1024 * 1024) {
    return `${(value / 1024).toFixed(1)} KiB`;
  }
  return `${(value / (1024 * 1024)).toFixed(1)} MiB`;
}

export function formatRate(value: Counter): string {
  return isKnown(value) ? `${value} kbit/s` : UNKNOWN_CELL;
}

export function describeCurve(curve: ServiceCurve): string {
  if (curve.kind === "link-share") {
    return `ls ${curve.sustainedRateKbps} kbit/s`;
  }
  return `rt ${curve.burstRateKbps} kbit/s for ${curve.burstDurationMs} ms, then ${curve.sustainedRateKbps} kbit/s`;
}

export function tierRows(tree: ClassTree): string[][] {
  return tree.tiers.map((tier) => [
    String(tier.id),
    tier.isDefault ? `${tier.label} (default)` : tier.label,
    String(tier.parentId),
    tier.priorityClass,
    describeCurve(tier.curve),
    String(tier.queueLimitBytes),
  ]);
}

export function renderTierTable(tree: ClassTree): string {
  const header = ["Tier", "Label", "Parent", "Priority", "Curve", "Queue (B)"].map((cell) => chalk.bold(cell));
  return table([header, ...tierRows(tree)]);
}

export function statsRows(snapshot: StatsSnapshot): string[][] {
  return snapshot.classes.map((entry) => {
    const dropped = formatCounter(entry.droppedPackets);
    return [
      entry.classId,
      entry.label,
      formatCounter(entry.packets),
      formatBytes(entry.bytes),
      isKnown(entry.droppedPackets) && entry.droppedPackets > 0 ? chalk.red(dropped) : dropped,
      formatRate(entry.currentRateKbps),
    ];
  });
}

export function renderStatsTable(snapshot: StatsSnapshot): string {
  const header = ["Class", "Label", "Packets", "Sent", "Dropped", "Rate"].map((cell) => chalk.bold(cell));
  return table([header, ...statsRows(snapshot)]);
}

export function renderSelfTest(report: SelfTestReport): string[] {
  const lines = report.checks.map((check) =>
    check.ok ? `${chalk.green("✓")} ${check.name}: ${check.detail}` : `${chalk.red("✗")} ${check.name}: ${check.detail}`
  );
  lines.push(report.passed ? chalk.green("All checks passed") : chalk.red("Self-test failed"));
  return lines;
}

export function renderWarnings(tree: ClassTree): string[] {
  return tree.warnings.map((warning) => chalk.yellow(`! ${warning.message}`));
}
