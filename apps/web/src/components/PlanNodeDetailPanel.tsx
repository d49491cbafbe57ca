import { Collapse, Typography } from "antd";
import { buildNodeDetailRows } from "../plan/nodeDetails";
import type { PlanNode } from "../plan/types";
import CopyIconButton from "./CopyIconButton";

const { Text } = Typography;

export interface PlanNodeDetailPanelProps {
  node: PlanNode | null;
}

function MetaRow(props: { label: string; value: string }): JSX.Element {
  const { label, value } = props;
  return (
    <div className="pc-node-detail-grid-row">
      <Text type="secondary" className="pc-node-detail-grid-label">
        {label}
      </Text>
      <Text code className="pc-node-detail-grid-value">
        {value}
      </Text>
    </div>
  );
}

export default function PlanNodeDetailPanel(props: PlanNodeDetailPanelProps): JSX.Element {
  const { node } = props;

  if (!node) {
    return (
      <div className="pc-node-detail pc-node-detail-empty">
        <Text type="secondary">Select an operator to inspect details.</Text>
      </div>
    );
  }

  const rows = buildNodeDetailRows(node);
  const rawItems = [
    {
      key: "raw-plan-line",
      label: <Text type="secondary">Raw Plan Line</Text>,
      extra: <CopyIconButton text={node.rawLine} tooltip="Copy raw line" />,
      children: (
        <pre className="pc-code-block pc-node-detail-code-block">
          <code>{node.rawLine}</code>
        </pre>
      ),
    },
  ];
  if (node.details.length > 0) {
    const detailText = node.details.join("\n");
    rawItems.push({
      key: "formatted-details",
      label: <Text type="secondary">Formatted Details</Text>,
      extra: <CopyIconButton text={detailText} tooltip="Copy details" />,
      children: (
        <pre className="pc-code-block pc-node-detail-code-block">
          <code>{detailText}</code>
        </pre>
      ),
    });
  }

  return (
    <div className="pc-node-detail">
      <div className="pc-node-detail-section">
        <Text type="secondary" className="pc-node-detail-section-title">
          Fields
        </Text>
        <div className="pc-node-detail-grid">
          {rows.map((row, idx) => (
            <MetaRow key={`${node.key}-row-${idx}`} label={row.label} value={row.value} />
          ))}
        </div>
      </div>

      <div className="pc-node-detail-section">
        <Collapse ghost size="small" items={rawItems} defaultActiveKey={["raw-plan-line"]} />
      </div>
    </div>
  );
}
