/**
 * ClassificationRuleEngine: match specifications → ordered marking rules,
 * plus the mark → class filters that go with them.
 *
 * @module shaping/rules
 */

import { isIP } from "node:net";
import { ClassificationError } from "../errors/shaping.js";
import { deepFreeze } from "../utils/freeze.js";
import {
  type ClassificationRule,
  type ClassTree,
  type FilterRule,
  type MatchSpec,
  PRIORITY_ORDER,
  type PortRange,
  type RuleMatch,
  type RuleSet,
  type Tier,
  type TierMatchSpecs,
} from "./types.js";

const MAX_PORT = 65535;

/**
 * Tiers in evaluation order: by priority class (strict first), ties kept in
 * tree order, the default tier last.
 */
export function orderTiersByPriority(tree: ClassTree): Tier[] {
  const regular = tree.tiers.filter((tier) => !tier.isDefault);
  const ordered = [...regular].sort(
    (a, b) => PRIORITY_ORDER.indexOf(a.priorityClass) - PRIORITY_ORDER.indexOf(b.priorityClass)
  );
  const fallback = tree.tiers.find((tier) => tier.isDefault);
  return fallback ? [...ordered, fallback] : ordered;
}

function validatePorts(ports: PortRange, tierId: number): void {
  const valid =
    Number.isInteger(ports.from) &&
    Number.isInteger(ports.to) &&
    ports.from >= 1 &&
    ports.to <= MAX_PORT &&
    ports.from <= ports.to;
  if (!valid) {
    throw new ClassificationError(`Invalid port range ${ports.from}:${ports.to} for tier ${tierId}`, {
      tierId,
      ports,
    });
  }
}

/**
 * Accepts a host address or a subnet in prefix notation.
 */
export function isValidAddress(value: string): boolean {
  const [host, prefix, ...rest] = value.split("/");
  if (host === undefined || rest.length > 0) {
    return false;
  }
  const family = isIP(host);
  if (family === 0) {
    return false;
  }
  if (prefix === undefined) {
    return true;
  }
  if (!/^\d{1,3}$/.test(prefix)) {
    return false;
  }
  return Number(prefix) <= (family === 4 ? 32 : 128);
}

/**
 * Splits a comma-separated address set, validating each entry.
 */
export function parseAddressSet(addresses: string, tierId: number): string[] {
  const entries = addresses
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    throw new ClassificationError(`Empty address set for tier ${tierId}`, { tierId });
  }
  for (const entry of entries) {
    if (!isValidAddress(entry)) {
      throw new ClassificationError(`Invalid address "${entry}" for tier ${tierId}`, { tierId, address: entry });
    }
  }
  return entries;
}

/**
 * One spec becomes one match, except address sets: each host or subnet
 * yields a source match and a destination match.
 */
export function expandMatchSpec(spec: MatchSpec, tierId: number): RuleMatch[] {
  switch (spec.type) {
    case "port":
      validatePorts(spec.ports, tierId);
      return [{ type: "port", protocol: spec.protocol, ports: { ...spec.ports }, side: spec.side }];
    case "protocol":
      return [{ type: "protocol", protocol: spec.protocol }];
    case "address":
      return parseAddressSet(spec.addresses, tierId).flatMap((address): RuleMatch[] => [
        { type: "address", address, side: "source" },
        { type: "address", address, side: "destination" },
      ]);
  }
}

/**
 * Builds the rule set for a class tree. Regenerated wholesale on every
 * change; the marking backend replaces its rule group rather than
 * appending to it.
 *
 * @throws ClassificationError for specs on unknown tiers or malformed matches
 */
export function compileRuleSet(tree: ClassTree, specs: TierMatchSpecs): RuleSet {
  const known = new Set(tree.tiers.map((tier) => tier.id));
  for (const tierId of specs.keys()) {
    if (!known.has(tierId)) {
      throw new ClassificationError(`Match specifications reference unknown tier ${tierId}`, { tierId });
    }
  }

  const rules: ClassificationRule[] = [];
  for (const tier of orderTiersByPriority(tree)) {
    for (const spec of specs.get(tier.id) ?? []) {
      for (const match of expandMatchSpec(spec, tier.id)) {
        rules.push({ match, mark: tier.id, precedence: rules.length + 1 });
      }
    }
  }

  return deepFreeze({ rules });
}

/**
 * One filter per non-default tier; unmarked traffic reaches the default
 * tier through the root's default class.
 */
export function compileFilters(tree: ClassTree): readonly FilterRule[] {
  const filters = orderTiersByPriority(tree)
    .filter((tier) => !tier.isDefault)
    .map((tier, index) => ({ mark: tier.id, tierId: tier.id, precedence: index + 1 }));
  return deepFreeze(filters);
}
