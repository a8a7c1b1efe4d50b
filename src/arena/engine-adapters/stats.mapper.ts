import type { SideCounters } from "../domain/gameResult";
import type { EngineLogEntry, EngineSide } from "../engine/simulationContract";

export type SideStats = SideCounters;

export function emptyStats(): SideStats {
  return { damage_dealt: 0, damage_received: 0, spells_cast: 0, artifacts_collected: 0 };
}

export function mapStats(log: readonly EngineLogEntry[], side: EngineSide): SideStats {
  const out = emptyStats();
  for (const entry of log) {
    switch (entry.type) {
      case "damage":
        if (entry.source === side) out.damage_dealt += entry.amount;
        if (entry.target === side) out.damage_received += entry.amount;
        break;
      case "spell":
        if (entry.caster === side) out.spells_cast += 1;
        break;
      case "artifact":
        if (entry.collector === side) out.artifacts_collected += 1;
        break;
    }
  }
  return out;
}
