import { MinusSquareOutlined, PlusSquareOutlined } from "@ant-design/icons";
import { Button, Tag, Typography } from "antd";
import type { D3ZoomEvent, ZoomBehavior, ZoomTransform } from "d3";
import { useEffect, useLayoutEffect, useMemo, useRef, useState } from "react";
import type { CSSProperties } from "react";
import { createLogger } from "../app/logger";
import type { DiagramOrientation, PlanLayout } from "../plan/layoutPlanTree";
import { keepCardInPlace, layoutPlanTree, linkKey, linkPath } from "../plan/layoutPlanTree";
import type { PlanTree } from "../plan/types";
import { buildParentByKey, collectInnerKeys } from "../plan/utils";
import { CATPPUCCIN_MOCHA, OPERATOR_KIND_COLORS } from "../theme/catppuccin";
import { formatBytes, formatDurationMs, formatNumber } from "../utils/format";
import PlanDiagramControls from "./PlanDiagramControls";

const { Text } = Typography;

type D3Module = typeof import("d3");
type PlanZoom = ZoomBehavior<SVGSVGElement, unknown>;
type AccentStyle = CSSProperties & Record<"--pc-diagram-accent", string>;

const MIN_SCALE = 0.15;
const MAX_SCALE = 2.5;
const VIEW_PADDING = 20;

const log = createLogger("plan-diagram");

export interface PlanDiagramTreeProps {
  tree: PlanTree;
  orientation: DiagramOrientation;

  selectedKey: string | null;
  onOpenNode: (key: string) => void;
  focusToken?: number;

  collapsedKeys: Set<string>;
  onToggleCollapsed: (key: string) => void;
  onCollapseAll: (keys: Iterable<string>) => void;
  onExpandAll: () => void;
}

export default function PlanDiagramTree(props: PlanDiagramTreeProps): JSX.Element {
  const {
    tree,
    orientation,
    selectedKey,
    onOpenNode,
    focusToken = 0,
    collapsedKeys,
    onToggleCollapsed,
    onCollapseAll,
    onExpandAll,
  } = props;

  const containerRef = useRef<HTMLDivElement | null>(null);
  const svgRef = useRef<SVGSVGElement | null>(null);
  const viewportRef = useRef<SVGGElement | null>(null);

  const zoomRef = useRef<PlanZoom | null>(null);
  const didInitialFitRef = useRef(false);
  const prevLayoutRef = useRef<PlanLayout | null>(null);
  const anchorKeyRef = useRef<string | null>(null);

  const [d3, setD3] = useState<D3Module | null>(null);
  const [libError, setLibError] = useState<string | null>(null);
  const [zoomReady, setZoomReady] = useState(false);

  useEffect(() => {
    didInitialFitRef.current = false;
  }, [tree, orientation]);

  useEffect(() => {
    let canceled = false;
    setLibError(null);

    const load = async () => {
      try {
        const mod = await import("d3");
        if (canceled) return;
        setD3(mod);
      } catch (e) {
        if (canceled) return;
        const message = e instanceof Error ? e.message : String(e);
        log.error(`d3 failed to load: ${message}`);
        setLibError(message);
      }
    };

    void load();

    return () => {
      canceled = true;
    };
  }, []);

  const layout = useMemo(
    () => layoutPlanTree(tree, { collapsedKeys, orientation }),
    [collapsedKeys, orientation, tree]
  );

  const parentByKey = useMemo(() => buildParentByKey(tree), [tree]);

  const selectedPathLinkKeys = useMemo(() => {
    if (!selectedKey) return null;
    const links = new Set<string>();
    let child = selectedKey;
    let parent = parentByKey.get(child) ?? null;
    while (parent) {
      links.add(linkKey(child, parent));
      child = parent;
      parent = parentByKey.get(child) ?? null;
    }
    return links;
  }, [parentByKey, selectedKey]);

  useEffect(() => {
    if (!d3 || !svgRef.current || !viewportRef.current) return;

    const svg = d3.select(svgRef.current);
    const zoom = d3
      .zoom<SVGSVGElement, unknown>()
      .scaleExtent([MIN_SCALE, MAX_SCALE])
      .on("zoom", (event: D3ZoomEvent<SVGSVGElement, unknown>) => {
        const viewport = viewportRef.current;
        if (!viewport) return;
        d3.select(viewport).attr("transform", event.transform.toString());
        if (event.sourceEvent) didInitialFitRef.current = true;
      });

    svg.call(zoom);
    zoomRef.current = zoom;
    setZoomReady(true);
    svg.call(zoom.transform, d3.zoomIdentity);

    return () => {
      svg.on(".zoom", null);
      zoomRef.current = null;
      setZoomReady(false);
    };
  }, [d3]);

  useEffect(() => {
    const container = containerRef.current;
    const svg = svgRef.current;
    if (!container || !svg) return;

    const applySize = () => {
      const w = container.clientWidth || 800;
      const h = container.clientHeight || 520;
      svg.setAttribute("width", String(w));
      svg.setAttribute("height", String(h));
    };

    applySize();
    const ro = new ResizeObserver(() => applySize());
    ro.observe(container);
    return () => ro.disconnect();
  }, []);

  const applyTransform = (t: ZoomTransform, animateMs: number) => {
    const zoom = zoomRef.current;
    if (!d3 || !svgRef.current || !zoom) return;
    const svg = d3.select(svgRef.current);
    if (animateMs > 0) svg.transition().duration(animateMs).call(zoom.transform, t);
    else svg.call(zoom.transform, t);
  };

  const scaleBy = (factor: number) => {
    const zoom = zoomRef.current;
    if (!d3 || !svgRef.current || !zoom) return;
    d3.select(svgRef.current).transition().duration(220).call(zoom.scaleBy, factor);
  };

  const onResetZoom = () => {
    if (!d3) return;
    applyTransform(d3.zoomIdentity, 220);
  };

  const fitToView = (animateMs: number) => {
    if (!d3 || !containerRef.current) return;
    const { width, height } = containerRef.current.getBoundingClientRect();
    if (width <= 0 || height <= 0) return;

    const bboxW = Math.max(1, layout.bbox.maxX - layout.bbox.minX);
    const bboxH = Math.max(1, layout.bbox.maxY - layout.bbox.minY);

    const scale = Math.min((width - VIEW_PADDING * 2) / bboxW, (height - VIEW_PADDING * 2) / bboxH);
    const clamped = Math.min(MAX_SCALE, Math.max(MIN_SCALE, scale));

    const tx = (width - bboxW * clamped) / 2 - layout.bbox.minX * clamped;
    const ty = (height - bboxH * clamped) / 2 - layout.bbox.minY * clamped;

    applyTransform(d3.zoomIdentity.translate(tx, ty).scale(clamped), animateMs);
  };

  const onFocusSelected = () => {
    if (!d3 || !containerRef.current || !selectedKey || !svgRef.current) return;
    const rect = layout.byKey.get(selectedKey);
    if (!rect) return;

    const { width, height } = containerRef.current.getBoundingClientRect();
    if (width <= 0 || height <= 0) return;

    const k = d3.zoomTransform(svgRef.current).k || 1;
    const tx = width / 2 - (rect.x + rect.width / 2) * k;
    const ty = height / 2 - (rect.y + rect.height / 2) * k;
    applyTransform(d3.zoomIdentity.translate(tx, ty).scale(k), 280);
  };

  // Collapsing or expanding a card keeps that card where it was on screen.
  useLayoutEffect(() => {
    const prev = prevLayoutRef.current;
    prevLayoutRef.current = layout;
    const key = anchorKeyRef.current;
    anchorKeyRef.current = null;
    if (!prev || !key || !d3 || !svgRef.current || !zoomRef.current) return;
    const t = keepCardInPlace(prev, layout, key, d3.zoomTransform(svgRef.current));
    applyTransform(d3.zoomIdentity.translate(t.x, t.y).scale(t.k), 0);
  }, [layout]);

  useEffect(() => {
    if (!d3 || !zoomReady) return;
    if (didInitialFitRef.current) return;
    didInitialFitRef.current = true;
    fitToView(0);
  }, [layout, d3, zoomReady]);

  const lastFocusTokenRef = useRef(0);
  useEffect(() => {
    if (!focusToken) return;
    if (focusToken <= lastFocusTokenRef.current) return;
    if (!d3 || !containerRef.current || !zoomReady || !selectedKey) return;
    if (!layout.byKey.get(selectedKey)) return;
    lastFocusTokenRef.current = focusToken;
    onFocusSelected();
  }, [focusToken, layout, d3, selectedKey, zoomReady]);

  return (
    <div ref={containerRef} className="pc-diagram">
      {libError ? <Text type="secondary">Zoom unavailable: {libError}</Text> : null}

      <svg ref={svgRef} className="pc-diagram-svg">
        <title>Plan Diagram</title>
        <defs>
          <marker
            id="pc-diagram-arrow"
            viewBox="0 0 10 10"
            refX="9"
            refY="5"
            markerWidth="7"
            markerHeight="7"
            orient="auto-start-reverse"
          >
            <path d="M0,0 L10,5 L0,10 z" fill={CATPPUCCIN_MOCHA.overlay1} />
          </marker>
        </defs>
        <g ref={viewportRef}>
          <g className="pc-diagram-links">
            {layout.links.map((l) => {
              const onSelectedPath = !!selectedPathLinkKeys?.has(l.key);
              const linkClass = `pc-diagram-link${onSelectedPath ? " pc-diagram-link-selected" : ""}`;
              return (
                <path
                  key={l.key}
                  className={linkClass}
                  d={linkPath(l)}
                  markerEnd="url(#pc-diagram-arrow)"
                />
              );
            })}
          </g>
          <g className="pc-diagram-nodes">
            {layout.nodes.map((n) => {
              const isSelected = selectedKey === n.key;
              const collapsed = collapsedKeys.has(n.key);
              const accentStyle: AccentStyle = {
                "--pc-diagram-accent": isSelected
                  ? CATPPUCCIN_MOCHA.mauve
                  : OPERATOR_KIND_COLORS[n.node.kind],
              };
              const cardClass = `pc-diagram-card${isSelected ? " pc-diagram-card-selected" : ""}`;
              const metrics = n.node.metrics;

              return (
                <foreignObject
                  key={n.key}
                  x={n.x - n.width / 2}
                  y={n.y}
                  width={n.width}
                  height={n.height}
                  style={{ overflow: "visible" }}
                >
                  <div className={cardClass} style={accentStyle}>
                    <div className="pc-diagram-card-header">
                      <button
                        type="button"
                        className="pc-diagram-card-open"
                        onPointerDown={(e) => e.stopPropagation()}
                        onClick={() => onOpenNode(n.key)}
                      >
                        <span className="pc-diagram-title">
                          <Text code className="pc-code-ellipsis">
                            {n.node.operator || n.node.kind}
                          </Text>
                          <Tag className="pc-diagram-tag" color={OPERATOR_KIND_COLORS[n.node.kind]}>
                            {n.node.kind}
                          </Tag>
                          {n.node.codegenStageId != null ? (
                            <Tag className="pc-diagram-tag">*({n.node.codegenStageId})</Tag>
                          ) : null}
                        </span>
                        <span className="pc-code-ellipsis pc-diagram-summary" title={n.node.summary}>
                          <Text type="secondary">{n.node.summary}</Text>
                        </span>
                      </button>

                      {n.hasChildren ? (
                        <Button
                          type="text"
                          size="small"
                          className="pc-diagram-collapse-btn"
                          onPointerDown={(e) => e.stopPropagation()}
                          icon={collapsed ? <PlusSquareOutlined /> : <MinusSquareOutlined />}
                          onClick={(e) => {
                            e.preventDefault();
                            e.stopPropagation();
                            anchorKeyRef.current = n.key;
                            onToggleCollapsed(n.key);
                          }}
                          aria-label={collapsed ? "Expand children" : "Collapse children"}
                        />
                      ) : null}
                    </div>

                    {metrics ? (
                      <div className="pc-diagram-metrics">
                        <Text type="secondary">
                          rows <Text code>{formatNumber(metrics.rowsOutput)}</Text>
                        </Text>
                        <Text type="secondary">
                          spill <Text code>{formatBytes(metrics.spillSizeBytes)}</Text>
                        </Text>
                        <Text type="secondary">
                          time <Text code>{formatDurationMs(metrics.durationMs)}</Text>
                        </Text>
                      </div>
                    ) : null}

                    {collapsed ? (
                      <div className="pc-diagram-collapsed-hint">
                        <Text type="secondary">
                          collapsed <Text code>{n.collapsedChildCount}</Text> children
                        </Text>
                      </div>
                    ) : null}
                  </div>
                </foreignObject>
              );
            })}
          </g>
        </g>
      </svg>

      <PlanDiagramControls
        onZoomIn={() => scaleBy(1.25)}
        onZoomOut={() => scaleBy(1 / 1.25)}
        onResetZoom={onResetZoom}
        onFitToView={() => fitToView(320)}
        onFocusSelected={onFocusSelected}
        canFocusSelected={!!selectedKey && !!layout.byKey.get(selectedKey)}
        onCollapseAll={() => onCollapseAll(collectInnerKeys(tree))}
        onExpandAll={onExpandAll}
      />
    </div>
  );
}
