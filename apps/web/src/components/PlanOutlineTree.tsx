import { MinusSquareOutlined, PlusSquareOutlined } from "@ant-design/icons";
import { Button, Space, Tag, Typography } from "antd";
import { useEffect, useMemo, useRef } from "react";
import { buildOutlineRows } from "../plan/outline";
import type { OutlineRow } from "../plan/outline";
import type { PlanTree } from "../plan/types";
import { collectInnerKeys } from "../plan/utils";
import { OPERATOR_KIND_COLORS } from "../theme/catppuccin";
import { formatNumber } from "../utils/format";

const { Text } = Typography;

const INDENT_PX = 18;

export interface PlanOutlineTreeProps {
  tree: PlanTree;
  selectedKey: string | null;
  onOpenNode: (key: string) => void;
  collapsedKeys: Set<string>;
  onToggleCollapsed: (key: string) => void;
  onCollapseAll: (keys: Iterable<string>) => void;
  onExpandAll: () => void;
}

export default function PlanOutlineTree(props: PlanOutlineTreeProps): JSX.Element {
  const {
    tree,
    selectedKey,
    onOpenNode,
    collapsedKeys,
    onToggleCollapsed,
    onCollapseAll,
    onExpandAll,
  } = props;

  const listRef = useRef<HTMLDivElement | null>(null);
  const rows = useMemo(() => buildOutlineRows(tree, collapsedKeys), [collapsedKeys, tree]);

  useEffect(() => {
    if (!selectedKey || !listRef.current) return;
    const el = listRef.current.querySelector(`[data-node-key="${selectedKey}"]`);
    if (el instanceof HTMLElement) el.scrollIntoView({ block: "nearest" });
  }, [selectedKey]);

  const renderRow = (row: OutlineRow): JSX.Element => {
    const n = row.node;
    const isSelected = selectedKey === n.key;
    const rowClass = `pc-outline-row${isSelected ? " pc-outline-row-selected" : ""}`;

    return (
      <div
        key={n.key}
        data-node-key={n.key}
        className={rowClass}
        style={{ paddingLeft: row.depth * INDENT_PX }}
      >
        {row.hasChildren ? (
          <Button
            type="text"
            size="small"
            icon={row.collapsed ? <PlusSquareOutlined /> : <MinusSquareOutlined />}
            onClick={(e) => {
              e.preventDefault();
              e.stopPropagation();
              onToggleCollapsed(n.key);
            }}
            aria-label={row.collapsed ? "Expand children" : "Collapse children"}
          />
        ) : (
          <span className="pc-outline-icon-placeholder" />
        )}

        <button type="button" className="pc-outline-open-btn" onClick={() => onOpenNode(n.key)}>
          <span className="pc-outline-title">
            <Text code>{n.operator || n.kind}</Text>
            <Tag className="pc-outline-tag" color={OPERATOR_KIND_COLORS[n.kind]}>
              {n.kind}
            </Tag>
            {n.engineId != null ? <Text type="secondary">({n.engineId})</Text> : null}
          </span>
          <span className="pc-code-ellipsis pc-outline-summary" title={n.summary}>
            <Text type="secondary">{n.summary}</Text>
          </span>
          {n.metrics?.rowsOutput != null ? (
            <span className="pc-outline-metric">
              <Text type="secondary">rows </Text>
              <Text code>{formatNumber(n.metrics.rowsOutput)}</Text>
            </span>
          ) : null}
          {row.collapsed ? (
            <span className="pc-outline-hint">
              <Text type="secondary">
                collapsed <Text code>{row.descendantCount}</Text> nodes
              </Text>
            </span>
          ) : null}
        </button>
      </div>
    );
  };

  return (
    <Space direction="vertical" style={{ width: "100%" }} size={8}>
      <Space style={{ justifyContent: "flex-end", display: "flex", width: "100%" }}>
        <Button type="text" size="small" onClick={onExpandAll} disabled={collapsedKeys.size === 0}>
          Expand all
        </Button>
        <Button type="text" size="small" onClick={() => onCollapseAll(collectInnerKeys(tree))}>
          Collapse all
        </Button>
      </Space>
      <div ref={listRef} className="pc-outline">
        {rows.map((r) => renderRow(r))}
      </div>
    </Space>
  );
}
