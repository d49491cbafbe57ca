import { Space, Typography } from "antd";
import type { PlanSignals } from "../plan/planSignals";
import { formatNumber } from "../utils/format";

const { Text } = Typography;

function SummaryItem(props: { label: string; value: string; title?: string }): JSX.Element {
  const { label, value, title } = props;
  return (
    <Text type="secondary" className="pc-summary-item" title={title ?? value}>
      {label}: <Text code>{value}</Text>
    </Text>
  );
}

export interface PlanSummaryBannerProps {
  signals: PlanSignals;
  section: string | null;
}

export default function PlanSummaryBanner(props: PlanSummaryBannerProps): JSX.Element {
  const { signals, section } = props;

  const kindEntries = Object.entries(signals.countsByKind).filter(([, count]) => count > 0);
  const kindText = kindEntries.map(([kind, count]) => `${kind} ${count}`).join(" · ");
  const kindTitle = kindEntries.map(([kind]) => kind).join(", ");

  return (
    <div className="pc-summary">
      <Space size={8} wrap>
        <SummaryItem label="section" value={section ?? "-"} />
        <SummaryItem label="operators" value={formatNumber(signals.nodeCount)} />
        <SummaryItem label="depth" value={String(signals.maxDepth)} />
        <SummaryItem label="shuffles" value={String(signals.shuffleCount)} />
        <SummaryItem label="shuffle partitions" value={formatNumber(signals.totalShufflePartitions)} />
        <SummaryItem label="broadcast joins" value={String(signals.broadcastJoinCount)} />
        <SummaryItem
          label="scans w/ pushdown"
          value={`${signals.pushedFilterScanCount}/${signals.scanCount}`}
        />
        {signals.spillNodeCount > 0 ? (
          <SummaryItem label="spilling" value={String(signals.spillNodeCount)} />
        ) : null}
      </Space>
      <div className="pc-summary-secondary">
        <SummaryItem label="kinds" value={kindText || "-"} title={kindTitle} />
      </div>
    </div>
  );
}
