import { Drawer, Space, Tag, Typography } from "antd";
import type { PlanNode } from "../plan/types";
import { OPERATOR_KIND_COLORS } from "../theme/catppuccin";
import PlanNodeDetailPanel from "./PlanNodeDetailPanel";

const { Text, Title } = Typography;

export interface PlanNodeDrawerProps {
  open: boolean;
  node: PlanNode | null;
  onClose: () => void;
}

export default function PlanNodeDrawer(props: PlanNodeDrawerProps): JSX.Element {
  const { open, node, onClose } = props;

  return (
    <Drawer title="Plan Node" placement="right" width={560} open={open} onClose={onClose} destroyOnClose>
      {node ? (
        <Space direction="vertical" size={14} style={{ width: "100%" }}>
          <Space direction="vertical" size={6} style={{ width: "100%" }}>
            <Title level={5} style={{ margin: 0 }}>
              <Text code>{node.operator || node.kind}</Text>
            </Title>
            <Space wrap size={6}>
              <Tag color={OPERATOR_KIND_COLORS[node.kind]}>{node.kind}</Tag>
              <Tag>Node {node.id}</Tag>
              {node.engineId != null ? <Tag>Engine id {node.engineId}</Tag> : null}
            </Space>
            <Text type="secondary">{node.summary}</Text>
          </Space>
          <PlanNodeDetailPanel node={node} />
        </Space>
      ) : (
        <Text type="secondary">No node selected.</Text>
      )}
    </Drawer>
  );
}
