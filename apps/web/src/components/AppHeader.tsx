import { Layout, Space, Typography } from "antd";
import type { AppConfig } from "../app/config";

const { Header } = Layout;
const { Title, Text } = Typography;

export interface AppHeaderProps {
  config: AppConfig;
}

export default function AppHeader(props: AppHeaderProps): JSX.Element {
  const { config } = props;
  return (
    <Header
      style={{
        display: "flex",
        alignItems: "center",
        justifyContent: "space-between",
        position: "sticky",
        top: 0,
        zIndex: 10,
        background: "rgba(30, 30, 46, 0.86)",
        backdropFilter: "blur(10px)",
        borderBottom: "1px solid rgba(88, 91, 112, 0.65)",
      }}
    >
      <Space align="baseline" size={12}>
        <Title level={3} style={{ margin: 0, color: "white" }}>
          Plan Canvas
        </Title>
        <Text style={{ color: "rgba(255,255,255,0.65)" }}>Spark query plan viewer</Text>
      </Space>
      <Text style={{ color: "rgba(255,255,255,0.45)" }}>
        {config.orientation === "sourcesAtTop" ? "sources at top" : "result at top"} · diagram up to{" "}
        {config.diagramMaxNodes} operators
      </Text>
    </Header>
  );
}
