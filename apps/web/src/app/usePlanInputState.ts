import { useCallback, useEffect, useState } from "react";
import type { DiagramOrientation } from "../plan/layoutPlanTree";
import { parseMetricsText } from "../plan/metricsSource";
import { parsePlan } from "../plan/parsePlan";
import type { MetricsSource, PlanParseResult, TextOrder } from "../plan/types";
import { createLogger } from "./logger";

const PLAN_TEXT_KEY = "plan-canvas.input.plan.v1";
const METRICS_TEXT_KEY = "plan-canvas.input.metrics.v1";

const log = createLogger("plan-parser");

function readSessionText(key: string): string {
  if (typeof window === "undefined") return "";
  try {
    return window.sessionStorage.getItem(key) ?? "";
  } catch {
    return "";
  }
}

function writeSessionText(key: string, value: string): void {
  if (typeof window === "undefined") return;
  try {
    if (!value.trim()) window.sessionStorage.removeItem(key);
    else window.sessionStorage.setItem(key, value);
  } catch {
    // Ignore storage quota / access errors.
  }
}

export interface PlanInputState {
  planText: string;
  setPlanText: (text: string) => void;
  metricsText: string;
  setMetricsText: (text: string) => void;
  textOrder: TextOrder;
  setTextOrder: (order: TextOrder) => void;
  orientation: DiagramOrientation;
  setOrientation: (orientation: DiagramOrientation) => void;
  result: PlanParseResult | null;
  metrics: MetricsSource | null;
  error: string | null;
  render: (input?: {
    planText?: string;
    metricsText?: string;
    textOrder?: TextOrder;
    orientation?: DiagramOrientation;
  }) => void;
  clear: () => void;
}

export function usePlanInputState(defaults: {
  textOrder: TextOrder;
  orientation: DiagramOrientation;
}): PlanInputState {
  const [planText, setPlanText] = useState(() => readSessionText(PLAN_TEXT_KEY));
  const [metricsText, setMetricsText] = useState(() => readSessionText(METRICS_TEXT_KEY));
  const [textOrder, setTextOrder] = useState<TextOrder>(defaults.textOrder);
  const [orientation, setOrientation] = useState<DiagramOrientation>(defaults.orientation);
  const [result, setResult] = useState<PlanParseResult | null>(null);
  const [metrics, setMetrics] = useState<MetricsSource | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    writeSessionText(PLAN_TEXT_KEY, planText);
  }, [planText]);

  useEffect(() => {
    writeSessionText(METRICS_TEXT_KEY, metricsText);
  }, [metricsText]);

  const render = useCallback<PlanInputState["render"]>(
    (input = {}) => {
      const text = input.planText ?? planText;
      const mText = input.metricsText ?? metricsText;
      const order = input.textOrder ?? textOrder;
      if (input.planText != null) setPlanText(input.planText);
      if (input.metricsText != null) setMetricsText(input.metricsText);
      if (input.textOrder != null) setTextOrder(input.textOrder);
      if (input.orientation != null) setOrientation(input.orientation);
      setError(null);

      let source: MetricsSource | null = null;
      try {
        source = parseMetricsText(mText);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        log.error(message);
        setError(message);
      }

      const res = parsePlan(text, { textOrder: order, metrics: source });
      if (res.ok) {
        log.info(`parsed ${res.tree.nodes.length} operators, ${res.warnings.length} warnings`);
      } else {
        log.error(`parse failed (${res.reason}): ${res.error}`);
      }
      setMetrics(source);
      setResult(res);
    },
    [metricsText, planText, textOrder]
  );

  const clear = useCallback(() => {
    setPlanText("");
    setMetricsText("");
    setResult(null);
    setMetrics(null);
    setError(null);
  }, []);

  return {
    planText,
    setPlanText,
    metricsText,
    setMetricsText,
    textOrder,
    setTextOrder,
    orientation,
    setOrientation,
    result,
    metrics,
    error,
    render,
    clear,
  };
}
