import type { DiagramOrientation } from "../plan/layoutPlanTree";
import type { TextOrder } from "../plan/types";

export const DEFAULT_DIAGRAM_MAX_NODES = 2000;

export interface AppConfig {
  /** Plans with more operators than this open in the outline view. */
  diagramMaxNodes: number;
  orientation: DiagramOrientation;
  textOrder: TextOrder;
}

export type AppEnv = Readonly<Record<string, unknown>>;

function readString(env: AppEnv, name: string): string | null {
  const v = env[name];
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

/**
 * Resolves `VITE_*` settings. Invalid values fall back to the defaults and
 * are reported in `warnings`.
 */
export function resolveAppConfig(env: AppEnv): { config: AppConfig; warnings: string[] } {
  const warnings: string[] = [];
  const config: AppConfig = {
    diagramMaxNodes: DEFAULT_DIAGRAM_MAX_NODES,
    orientation: "sourcesAtTop",
    textOrder: "parentFirst",
  };

  const maxNodes = readString(env, "VITE_DIAGRAM_MAX_NODES");
  if (maxNodes != null) {
    const n = Number(maxNodes);
    if (Number.isInteger(n) && n > 0) config.diagramMaxNodes = n;
    else warnings.push(`VITE_DIAGRAM_MAX_NODES must be a positive integer, got "${maxNodes}"`);
  }

  const orientation = readString(env, "VITE_DIAGRAM_ORIENTATION");
  if (orientation === "sourcesAtTop" || orientation === "resultAtTop") {
    config.orientation = orientation;
  } else if (orientation != null) {
    warnings.push(`VITE_DIAGRAM_ORIENTATION must be sourcesAtTop or resultAtTop, got "${orientation}"`);
  }

  const textOrder = readString(env, "VITE_PLAN_TEXT_ORDER");
  if (textOrder === "parentFirst" || textOrder === "childrenFirst") {
    config.textOrder = textOrder;
  } else if (textOrder != null) {
    warnings.push(`VITE_PLAN_TEXT_ORDER must be parentFirst or childrenFirst, got "${textOrder}"`);
  }

  return { config, warnings };
}
