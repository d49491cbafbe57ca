import { findOperatorRule } from "./operators";
import { parseByteSize, parseNumberLike } from "./textUtils";
import type { ClassifiedPlanNode, PlanLine, StageStats } from "./types";

const statisticsRe = /Statistics\((?<stats>[^)]*)\)/;
const queryStageRe = /QueryStage\s+(?<id>\d+)/;
const sizeInBytesRe = /sizeInBytes=(?<v>[^,]+)/;
const rowCountRe = /rowCount=(?<v>[^,\s]+)/;

function extractStageStats(fullText: string): StageStats | null {
  const stage = fullText.match(queryStageRe)?.groups?.id;
  const stats = fullText.match(statisticsRe)?.groups?.stats;
  if (stage == null && stats == null) return null;
  const size = stats?.match(sizeInBytesRe)?.groups?.v;
  const rows = stats?.match(rowCountRe)?.groups?.v;
  return {
    stageId: stage != null ? Number(stage) : null,
    rowCount: parseNumberLike(rows),
    sizeInBytes: size != null ? parseByteSize(size) : null,
  };
}

function stripEngineId(text: string, engineId: string | null): string {
  if (engineId == null) return text;
  return text.replace(` (${engineId})`, "").trim();
}

/**
 * Assigns an operator kind and structured fields to one plan line. Lines
 * whose keyword no rule claims become `Unknown` with the line text as summary.
 */
export function classifyPlanLine(
  line: PlanLine,
  details: readonly string[] = []
): ClassifiedPlanNode {
  const body = stripEngineId(line.text, line.engineId);
  const fullText = [body, ...details].join("\n");
  const common = {
    operator: line.keyword,
    text: line.text,
    rawLine: line.rawLine,
    engineId: line.engineId,
    codegenStageId: line.codegenStageId,
    stageStats: extractStageStats(fullText),
    details: [...details],
  };

  const rule = findOperatorRule(line.keyword);
  if (!rule) {
    return {
      ...common,
      kind: "Unknown",
      fields: { kind: "Unknown", keyword: line.keyword },
      summary: line.text,
    };
  }

  const { fields, summary } = rule.classify({ keyword: line.keyword, body, fullText });
  return { ...common, kind: rule.kind, fields, summary: summary || body };
}
