import { renderToStaticMarkup } from "react-dom/server";
import type { PlanLayout } from "../plan/layoutPlanTree";
import { VIEW_PADDING, linkPath } from "../plan/layoutPlanTree";
import { CATPPUCCIN_MOCHA, OPERATOR_KIND_COLORS } from "../theme/catppuccin";
import { formatMetricsLine, truncateEnd } from "../utils/format";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const SUMMARY_MAX_CHARS = 44;
const ACCENT_WIDTH = 6;

export interface PlanSvgProps {
  layout: PlanLayout;
  title?: string;
}

/** Pure SVG rendering of a laid-out plan, usable without a DOM. */
export function PlanSvg(props: PlanSvgProps): JSX.Element {
  const { layout, title = "Plan" } = props;
  const width = Math.ceil(layout.bbox.maxX + VIEW_PADDING);
  const height = Math.ceil(layout.bbox.maxY + VIEW_PADDING);

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
      fontFamily="ui-monospace, Menlo, Consolas, monospace"
    >
      <title>{title}</title>
      <defs>
        <marker
          id="plan-arrow"
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
      <rect className="plan-background" width={width} height={height} fill={CATPPUCCIN_MOCHA.base} />
      <g className="plan-links">
        {layout.links.map((l) => (
          <path
            key={l.key}
            className="plan-link"
            d={linkPath(l)}
            fill="none"
            stroke={CATPPUCCIN_MOCHA.overlay1}
            strokeWidth={1.5}
            markerEnd="url(#plan-arrow)"
          />
        ))}
      </g>
      <g className="plan-nodes">
        {layout.nodes.map((n) => {
          const m = n.node.metrics;
          const kindLine = n.node.engineId != null ? `${n.node.kind} (${n.node.engineId})` : n.node.kind;
          return (
            <g key={n.key} transform={`translate(${n.x - n.width / 2},${n.y})`}>
              <rect
                className="plan-card"
                width={n.width}
                height={n.height}
                rx={10}
                fill={CATPPUCCIN_MOCHA.surface0}
                stroke={CATPPUCCIN_MOCHA.surface2}
              />
              <rect width={ACCENT_WIDTH} height={n.height} rx={3} fill={OPERATOR_KIND_COLORS[n.node.kind]} />
              <text x={16} y={24} fontSize={14} fill={CATPPUCCIN_MOCHA.text}>
                {n.node.operator || n.node.kind}
              </text>
              <text x={16} y={46} fontSize={11} fill={CATPPUCCIN_MOCHA.subtext0}>
                {kindLine}
              </text>
              <text x={16} y={68} fontSize={12} fill={CATPPUCCIN_MOCHA.subtext1}>
                {truncateEnd(n.node.summary, SUMMARY_MAX_CHARS)}
              </text>
              {m ? (
                <text x={16} y={96} fontSize={11} fill={CATPPUCCIN_MOCHA.subtext0}>
                  {formatMetricsLine(m)}
                </text>
              ) : null}
            </g>
          );
        })}
      </g>
    </svg>
  );
}

export function renderPlanSvgDocument(layout: PlanLayout, title?: string): string {
  return `${XML_DECLARATION}\n${renderToStaticMarkup(<PlanSvg layout={layout} title={title} />)}`;
}
