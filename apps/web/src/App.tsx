import { Alert, Layout, Typography } from "antd";
import { useEffect, useMemo, useState } from "react";
import { resolveAppConfig } from "./app/config";
import { createLogger } from "./app/logger";
import AppHeader from "./components/AppHeader";
import PlanWorkspace from "./components/PlanWorkspace";

const { Content } = Layout;
const { Text } = Typography;

const log = createLogger("app");

export default function App(): JSX.Element {
  const { config, warnings } = useMemo(() => resolveAppConfig(import.meta.env), []);
  const [showWarnings, setShowWarnings] = useState(warnings.length > 0);

  useEffect(() => {
    for (const w of warnings) log.error(w);
  }, [warnings]);

  return (
    <Layout style={{ minHeight: "100vh" }}>
      <AppHeader config={config} />

      <Content style={{ padding: 24, maxWidth: 1360, width: "100%", margin: "0 auto" }}>
        {showWarnings ? (
          <Alert
            type="warning"
            message="Configuration"
            description={<Text style={{ whiteSpace: "pre-wrap" }}>{warnings.join("\n")}</Text>}
            showIcon
            closable
            onClose={() => setShowWarnings(false)}
            style={{ marginBottom: 16 }}
          />
        ) : null}

        <PlanWorkspace config={config} />
      </Content>
    </Layout>
  );
}
