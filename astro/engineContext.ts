/**
 * Read-only engine context: reference tables plus the versioned policies.
 * Validated once when created, then shared by every chart computation.
 */

import { validateCombustionPolicy } from "./combustion.js";
import { deepFreeze } from "./freeze.js";
import { validateLordshipPolicy } from "./lordship.js";
import { COMBUSTION_POLICY_V1, type CombustionPolicyV1 } from "./policy/combustionPolicy.v1.js";
import { LORDSHIP_POLICY_V1, type LordshipPolicyV1 } from "./policy/lordshipPolicy.v1.js";
import { STRENGTH_POLICY_V1, type StrengthPolicyV1 } from "./policy/strengthPolicy.v1.js";
import { getReferenceTables, type ReferenceTables } from "./reference/referenceTables.js";
import { validateStrengthPolicy } from "./strength.js";

export interface EngineContext {
  tables: ReferenceTables;
  strengthPolicy: StrengthPolicyV1;
  lordshipPolicy: LordshipPolicyV1;
  combustionPolicy: CombustionPolicyV1;
}

export function createEngineContext(overrides: Partial<EngineContext> = {}): EngineContext {
  const context: EngineContext = {
    tables: overrides.tables ?? getReferenceTables(),
    strengthPolicy: overrides.strengthPolicy ?? STRENGTH_POLICY_V1,
    lordshipPolicy: overrides.lordshipPolicy ?? LORDSHIP_POLICY_V1,
    combustionPolicy: overrides.combustionPolicy ?? COMBUSTION_POLICY_V1,
  };
  validateStrengthPolicy(context.strengthPolicy);
  validateLordshipPolicy(context.lordshipPolicy, context.tables);
  validateCombustionPolicy(context.combustionPolicy);
  return deepFreeze(context);
}

let defaultContext: EngineContext | undefined;

export function getEngineContext(): EngineContext {
  if (!defaultContext) {
    defaultContext = createEngineContext();
  }
  return defaultContext;
}
