import {
  AimOutlined,
  CompressOutlined,
  MinusOutlined,
  NodeCollapseOutlined,
  NodeExpandOutlined,
  PlusOutlined,
  ReloadOutlined,
} from "@ant-design/icons";
import { Button, Space, Tooltip } from "antd";
import type { ReactNode } from "react";

export interface PlanDiagramControlsProps {
  onZoomIn: () => void;
  onZoomOut: () => void;
  onResetZoom: () => void;
  onFitToView: () => void;
  onFocusSelected: () => void;
  canFocusSelected: boolean;
  onCollapseAll: () => void;
  onExpandAll: () => void;
}

function ControlButton(props: {
  label: string;
  icon: ReactNode;
  onClick: () => void;
  disabled?: boolean;
}): JSX.Element {
  const { label, icon, onClick, disabled = false } = props;
  return (
    <Tooltip title={label} placement="left">
      <Button
        type="default"
        size="small"
        icon={icon}
        aria-label={label}
        onClick={onClick}
        disabled={disabled}
      />
    </Tooltip>
  );
}

export default function PlanDiagramControls(props: PlanDiagramControlsProps): JSX.Element {
  const {
    onZoomIn,
    onZoomOut,
    onResetZoom,
    onFitToView,
    onFocusSelected,
    canFocusSelected,
    onCollapseAll,
    onExpandAll,
  } = props;

  return (
    <div className="pc-diagram-controls">
      <Space direction="vertical" size={6}>
        <ControlButton label="Zoom in" icon={<PlusOutlined />} onClick={onZoomIn} />
        <ControlButton label="Zoom out" icon={<MinusOutlined />} onClick={onZoomOut} />
        <ControlButton label="Reset zoom" icon={<ReloadOutlined />} onClick={onResetZoom} />
        <ControlButton label="Fit to view" icon={<CompressOutlined />} onClick={onFitToView} />
        <ControlButton
          label="Focus selected"
          icon={<AimOutlined />}
          onClick={onFocusSelected}
          disabled={!canFocusSelected}
        />
        <ControlButton label="Collapse all" icon={<NodeCollapseOutlined />} onClick={onCollapseAll} />
        <ControlButton label="Expand all" icon={<NodeExpandOutlined />} onClick={onExpandAll} />
      </Space>
    </div>
  );
}
