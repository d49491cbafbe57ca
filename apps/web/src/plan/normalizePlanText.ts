import { MalformedPlanError } from "./errors";
import type { NormalizedPlanText, PlanLine } from "./types";

const sectionHeaderRe = /^={2,}\s*(?<title>[^=]+?)\s*={2,}$/;
const tableBorderRe = /^\+-+(?:\+-+)*\+$/;
const treeMarkerRe = /^(?<prefix>[ :|]*?)(?<marker>[+:]-)(?:\s|$)(?<rest>.*)$/;
const adaptiveHeaderRe = /^==\s*(?<phase>Final|Current|Initial) Plan\s*==$/i;
const codegenPrefixRe = /^\*(?:\((?<stage>\d+)\))?\s+/;
const engineIdRe = /\s\((?<id>\d+)\)(?=,|$)/;
const detailHeaderRe = /^\((?<id>\d+)\)\s+(?<rest>.+)$/;
const keywordRe = /^[A-Za-z_][A-Za-z0-9_]*/;

const MARKER_WIDTH = 3;

/** Operators printed as inner plans two levels below the node that holds them. */
const NESTED_PLAN_KEYWORDS = new Set([
  "Subquery",
  "ReusedSubquery",
  "SubqueryBroadcast",
  "InMemoryRelation",
]);

type NumberedLine = { lineNumber: number; line: string };

type Section = { title: string | null; lines: NumberedLine[] };

type PendingLine = {
  lineNumber: number;
  rawLine: string;
  /** Line with the adaptive-plan rebasing prefix removed. */
  body: string;
  depthOffset: number;
};

function stripFraming(rawText: string): { lines: string[]; warnings: string[] } {
  const lines = rawText
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .split("\n")
    .map((l) => l.trimEnd());

  const framed = lines.some((l) => tableBorderRe.test(l.trim()));
  if (!framed) return { lines, warnings: [] };

  const out: string[] = [];
  for (const line of lines) {
    if (tableBorderRe.test(line.trim())) continue;
    let v = line;
    if (v.startsWith("|")) v = v.replace(/^\| ?/, "");
    if (v.endsWith("|")) v = v.replace(/\s*\|$/, "");
    if (/^\s*plan\s*$/i.test(v)) continue;
    out.push(v.trimEnd());
  }
  return { lines: out, warnings: ["table framing detected and removed"] };
}

function hasContent(section: Section): boolean {
  return section.lines.some((l) => l.line.trim());
}

function splitSections(lines: string[]): Section[] {
  const sections: Section[] = [];
  let current: Section = { title: null, lines: [] };

  lines.forEach((line, index) => {
    const m = line.trim().match(sectionHeaderRe);
    if (m?.groups && !line.startsWith(" ")) {
      if (current.title != null || hasContent(current)) sections.push(current);
      current = { title: m.groups.title, lines: [] };
      return;
    }
    current.lines.push({ lineNumber: index + 1, line });
  });
  if (current.title != null || hasContent(current)) sections.push(current);
  return sections;
}

function selectSection(sections: Section[], warnings: string[]): Section | null {
  const candidates = sections.filter((s) => !/subquer/i.test(s.title ?? "") && hasContent(s));
  if (sections.some((s) => /subquer/i.test(s.title ?? ""))) {
    warnings.push("subquery plans are not rendered");
  }
  if (candidates.length === 0) return null;
  const physical = candidates.find((s) => /physical/i.test(s.title ?? ""));
  const chosen = physical ?? candidates[candidates.length - 1];
  if (candidates.length > 1 && !physical) {
    warnings.push(`no physical plan section; using "${chosen.title ?? "untitled"}"`);
  }
  return chosen;
}

function isDetailHeader(line: string): boolean {
  return detailHeaderRe.test(line.trim()) && !line.startsWith(" ");
}

/**
 * Splits a section into its operator tree and the formatted-mode detail
 * blocks that follow it. A blank line only ends the tree when a detail block
 * comes next.
 */
function splitTreeAndDetails(section: Section): {
  tree: NumberedLine[];
  details: Map<string, string[]>;
} {
  const tree: NumberedLine[] = [];
  const details = new Map<string, string[]>();
  let i = 0;
  const lines = section.lines;

  for (; i < lines.length; i++) {
    const entry = lines[i];
    if (!entry.line.trim()) continue;
    if (tree.length > 0 && isDetailHeader(entry.line)) break;
    tree.push(entry);
  }

  let currentId: string | null = null;
  for (; i < lines.length; i++) {
    const line = lines[i].line.trim();
    if (!line) {
      currentId = null;
      continue;
    }
    const m = line.match(detailHeaderRe);
    if (m?.groups && !lines[i].line.startsWith(" ")) {
      currentId = m.groups.id;
      details.set(currentId, [m.groups.rest]);
      continue;
    }
    if (currentId != null) details.get(currentId)?.push(line);
  }

  return { tree, details };
}

function isSchemaLine(line: string): boolean {
  return !line.includes("[") && /^[\w.`]+:\s*\w+(?:,\s*[\w.`]+:\s*.+)*$/.test(line.trim());
}

function markerColumn(line: string): number | null {
  const m = line.match(treeMarkerRe);
  if (!m?.groups) return null;
  return m.groups.prefix.length;
}

/**
 * Keeps the final (or current) plan of an adaptive plan and drops the
 * initial one. Kept lines are rebased so they hang under the adaptive root.
 */
function selectAdaptivePlan(tree: NumberedLine[], warnings: string[]): PendingLine[] {
  const headers: Array<{ index: number; phase: string; column: number }> = [];
  tree.forEach((entry, index) => {
    const m = entry.line.match(treeMarkerRe);
    const phase = m?.groups?.rest.trim().match(adaptiveHeaderRe)?.groups?.phase;
    if (m?.groups && phase) {
      headers.push({ index, phase: phase.toLowerCase(), column: m.groups.prefix.length });
    }
  });

  if (headers.length === 0) {
    return tree.map((e) => ({
      lineNumber: e.lineNumber,
      rawLine: e.line,
      body: e.line,
      depthOffset: 0,
    }));
  }

  const keep =
    headers.find((h) => h.phase === "final" || h.phase === "current") ?? headers[0];
  const dropped = headers.filter((h) => h !== keep).map((h) => h.phase);
  if (dropped.length > 0) warnings.push(`adaptive plan: showing ${keep.phase} plan`);

  const out: PendingLine[] = [];
  let active: { column: number; keep: boolean } | null = null;

  for (let index = 0; index < tree.length; index++) {
    const entry = tree[index];
    const header = headers.find((h) => h.index === index);
    if (header) {
      active = { column: header.column, keep: header === keep };
      continue;
    }
    if (active) {
      const indent = leadingWhitespace(entry.line).length;
      const col = markerColumn(entry.line) ?? indent;
      if (col > active.column) {
        if (!active.keep) continue;
        out.push({
          lineNumber: entry.lineNumber,
          rawLine: entry.line,
          body: entry.line.slice(Math.min(active.column + MARKER_WIDTH, indent)),
          depthOffset: active.column / MARKER_WIDTH + 1,
        });
        continue;
      }
      active = null;
    }
    out.push({ lineNumber: entry.lineNumber, rawLine: entry.line, body: entry.line, depthOffset: 0 });
  }

  return out;
}

function leadingWhitespace(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

function computeIndentUnit(lines: PendingLine[]): number {
  let unit = 0;
  for (const l of lines) {
    const ws = leadingWhitespace(l.body);
    if (!ws || ws.includes("\t")) continue;
    unit = unit === 0 ? ws.length : Math.min(unit, ws.length);
  }
  return unit;
}

function depthFromIndentation(line: PendingLine, unit: number): number {
  const ws = leadingWhitespace(line.body);
  if (!ws) return line.depthOffset;
  if (/^\t+$/.test(ws)) return line.depthOffset + ws.length;
  if (ws.includes("\t") || unit === 0 || ws.length % unit !== 0) {
    throw new MalformedPlanError(
      "misalignedIndent",
      `Indentation of ${JSON.stringify(ws)} does not align to the ${unit}-space nesting unit`,
      line.lineNumber
    );
  }
  return line.depthOffset + ws.length / unit;
}

function depthFromTreeMarker(line: PendingLine): { depth: number; rest: string } {
  const m = line.body.match(treeMarkerRe);
  if (!m?.groups) {
    if (leadingWhitespace(line.body)) {
      throw new MalformedPlanError(
        "misalignedIndent",
        "Indented line without a tree marker",
        line.lineNumber
      );
    }
    return { depth: line.depthOffset, rest: line.body.trim() };
  }
  const column = m.groups.prefix.length;
  if (column % MARKER_WIDTH !== 0) {
    throw new MalformedPlanError(
      "misalignedIndent",
      `Tree marker at column ${column} does not align to a nesting level`,
      line.lineNumber
    );
  }
  return { depth: line.depthOffset + column / MARKER_WIDTH + 1, rest: m.groups.rest.trim() };
}

export function toPlanLine(
  lineNumber: number,
  depth: number,
  rest: string,
  rawLine: string
): PlanLine {
  let text = rest.trim();
  let codegenStageId: number | null = null;
  const cg = text.match(codegenPrefixRe);
  if (cg) {
    codegenStageId = cg.groups?.stage != null ? Number(cg.groups.stage) : null;
    text = text.slice(cg[0].length).trim();
  }
  const engineId = text.match(engineIdRe)?.groups?.id ?? null;
  const keyword = text.match(keywordRe)?.[0] ?? "";
  return { lineNumber, depth, text, rawLine, keyword, engineId, codegenStageId };
}

/**
 * Drops the subquery and cached-relation plans that hang inside an operator.
 * Any other jump of more than one level is left for the tree builder to reject.
 */
function dropNestedPlans(lines: PlanLine[], warnings: string[]): PlanLine[] {
  const out: PlanLine[] = [];
  let nestedDepth: number | null = null;

  for (const line of lines) {
    if (nestedDepth != null && line.depth > nestedDepth) continue;
    const prev = out[out.length - 1];
    const startsNested =
      NESTED_PLAN_KEYWORDS.has(line.keyword) &&
      (line.depth === nestedDepth || (prev != null && line.depth === prev.depth + 2));
    if (startsNested) {
      nestedDepth = line.depth;
      warnings.push(`inline ${line.keyword} plan on line ${line.lineNumber} is not rendered`);
      continue;
    }
    nestedDepth = null;
    out.push(line);
  }
  return out;
}

export function normalizePlanText(rawText: string): NormalizedPlanText {
  if (!rawText.trim()) throw new MalformedPlanError("empty", "Plan text is empty");

  const framing = stripFraming(rawText);
  const warnings = [...framing.warnings];
  const section = selectSection(splitSections(framing.lines), warnings);
  if (!section) {
    throw new MalformedPlanError("noPlanSection", "No plan section found in input");
  }

  const { tree, details } = splitTreeAndDetails(section);
  if (/analyzed/i.test(section.title ?? "") && tree.length > 0 && isSchemaLine(tree[0].line)) {
    tree.shift();
  }

  const pending = selectAdaptivePlan(tree, warnings);
  const treeStyle = pending.some((l) => treeMarkerRe.test(l.body));
  const unit = treeStyle ? 0 : computeIndentUnit(pending);

  const lines: PlanLine[] = [];
  for (const p of pending) {
    const { depth, rest } = treeStyle
      ? depthFromTreeMarker(p)
      : { depth: depthFromIndentation(p, unit), rest: p.body.trim() };
    if (!rest) continue;
    lines.push(toPlanLine(p.lineNumber, depth, rest, p.rawLine));
  }

  const kept = dropNestedPlans(lines, warnings);
  if (kept.length === 0) {
    throw new MalformedPlanError("noPlanSection", "No operator lines found in plan section");
  }

  return { section: section.title, lines: kept, detailsByEngineId: details, warnings };
}
