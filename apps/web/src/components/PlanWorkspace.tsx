import { DownOutlined, ReloadOutlined } from "@ant-design/icons";
import { Alert, Button, Card, Collapse, Dropdown, Input, Select, Space, Tabs, Typography } from "antd";
import { useEffect, useMemo, useState } from "react";
import type { AppConfig } from "../app/config";
import { createLogger } from "../app/logger";
import { usePlanInputState } from "../app/usePlanInputState";
import type { PlanViewMode } from "../app/usePlanViewState";
import { usePlanViewState } from "../app/usePlanViewState";
import { PLAN_FIXTURES } from "../plan/fixtures";
import type { DiagramOrientation } from "../plan/layoutPlanTree";
import { layoutPlanTree } from "../plan/layoutPlanTree";
import { ancestorKeys } from "../plan/outline";
import { buildPlanDocument, parsePlanDocument, serializePlanDocument } from "../plan/planDocument";
import { summarizePlanSignals } from "../plan/planSignals";
import type { TextOrder } from "../plan/types";
import { renderPlanSvgDocument } from "../render/staticPlanSvg";
import CopyIconButton from "./CopyIconButton";
import PlanDiagramTree from "./PlanDiagramTree";
import PlanNodeDrawer from "./PlanNodeDrawer";
import PlanOutlineTree from "./PlanOutlineTree";
import PlanSummaryBanner from "./PlanSummaryBanner";

const { Text } = Typography;
const { TextArea } = Input;

const log = createLogger("plan-workspace");

const TEXT_ORDER_OPTIONS: Array<{ value: TextOrder; label: string }> = [
  { value: "parentFirst", label: "Parent first" },
  { value: "childrenFirst", label: "Children first" },
];

const ORIENTATION_OPTIONS: Array<{ value: DiagramOrientation; label: string }> = [
  { value: "sourcesAtTop", label: "Sources at top" },
  { value: "resultAtTop", label: "Result at top" },
];

function isViewMode(v: string): v is PlanViewMode {
  return v === "diagram" || v === "outline" || v === "raw" || v === "document";
}

export interface PlanWorkspaceProps {
  config: AppConfig;
}

export default function PlanWorkspace(props: PlanWorkspaceProps): JSX.Element {
  const { config } = props;

  const input = usePlanInputState({ textOrder: config.textOrder, orientation: config.orientation });
  const view = usePlanViewState();
  const [documentText, setDocumentText] = useState("");
  const [documentError, setDocumentError] = useState<string | null>(null);

  const okRes = input.result?.ok ? input.result : null;
  const tree = okRes?.tree ?? null;

  const loadSample = (key: string) => {
    const sample = PLAN_FIXTURES.find((f) => f.key === key);
    if (!sample) return;
    input.render({ planText: sample.text, metricsText: "" });
  };

  const { reset, setViewMode } = view;
  useEffect(() => {
    reset();
    if (input.result) setViewMode(input.result.ok ? "diagram" : "raw");
  }, [input.result, reset, setViewMode]);

  const diagramDisabled = !tree || tree.nodes.length > config.diagramMaxNodes;
  useEffect(() => {
    if (view.viewMode === "diagram" && tree && diagramDisabled) setViewMode("outline");
  }, [diagramDisabled, setViewMode, tree, view.viewMode]);

  const signals = useMemo(() => (tree ? summarizePlanSignals(tree) : null), [tree]);

  const exportLayout = useMemo(
    () => (tree ? layoutPlanTree(tree, { orientation: input.orientation }) : null),
    [input.orientation, tree]
  );

  const documentJson = useMemo(() => {
    if (!okRes || !exportLayout) return "";
    return serializePlanDocument(
      buildPlanDocument({
        rawText: okRes.rawText,
        tree: okRes.tree,
        layout: exportLayout,
        metrics: input.metrics,
      })
    );
  }, [exportLayout, input.metrics, okRes]);

  const svgMarkup = () =>
    exportLayout ? renderPlanSvgDocument(exportLayout, tree?.section ?? "Plan") : "";

  const selectedNode = useMemo(
    () => (tree && view.selectedKey ? (tree.nodes.find((n) => n.key === view.selectedKey) ?? null) : null),
    [tree, view.selectedKey]
  );

  const openNode = (key: string) => {
    view.openNode(key, tree ? ancestorKeys(tree, key) : []);
  };

  const onLoadDocument = () => {
    setDocumentError(null);
    try {
      const source = parsePlanDocument(documentText);
      input.render({
        planText: source.rawText,
        metricsText: source.metrics ? JSON.stringify(source.metrics, null, 2) : "",
        textOrder: source.textOrder,
        orientation: source.orientation,
      });
      setDocumentText("");
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.error(message);
      setDocumentError(message);
    }
  };

  const parseFailure = input.result && !input.result.ok ? input.result : null;
  const warnings = okRes?.warnings ?? [];

  return (
    <Space direction="vertical" style={{ width: "100%" }} size="middle">
      <Card
        size="small"
        title="Plan Input"
        extra={
          <Space>
            <CopyIconButton text={input.planText} tooltip="Copy plan text" />
            <Button icon={<ReloadOutlined />} onClick={input.clear} disabled={!input.planText}>
              Clear
            </Button>
          </Space>
        }
      >
        <Space direction="vertical" style={{ width: "100%" }} size={12}>
          <TextArea
            value={input.planText}
            onChange={(e) => input.setPlanText(e.target.value)}
            placeholder="Paste the output of EXPLAIN / Dataset.explain"
            autoSize={{ minRows: 6, maxRows: 14 }}
            className="pc-code-input"
          />
          <Collapse
            ghost
            size="small"
            items={[
              {
                key: "metrics",
                label: <Text type="secondary">Runtime metrics (JSON, optional)</Text>,
                children: (
                  <TextArea
                    value={input.metricsText}
                    onChange={(e) => input.setMetricsText(e.target.value)}
                    placeholder='{ "keyBy": "engineId", "metrics": { "4": { "number of output rows": "1,024" } } }'
                    autoSize={{ minRows: 3, maxRows: 10 }}
                    className="pc-code-input"
                  />
                ),
              },
            ]}
          />
          <Space wrap>
            <Button type="primary" onClick={() => input.render()} disabled={!input.planText.trim()}>
              Render plan
            </Button>
            <Dropdown
              menu={{
                items: PLAN_FIXTURES.map((f) => ({ key: f.key, label: f.label })),
                onClick: ({ key }) => loadSample(key),
              }}
            >
              <Button icon={<DownOutlined />}>Load sample</Button>
            </Dropdown>
            <Text type="secondary">Line order:</Text>
            <Select
              value={input.textOrder}
              onChange={(v: TextOrder) => input.setTextOrder(v)}
              options={TEXT_ORDER_OPTIONS}
              style={{ width: 160 }}
            />
            <Text type="secondary">Diagram:</Text>
            <Select
              value={input.orientation}
              onChange={(v: DiagramOrientation) => input.setOrientation(v)}
              options={ORIENTATION_OPTIONS}
              style={{ width: 160 }}
            />
          </Space>

          {input.error ? (
            <Alert
              type="error"
              message="Metrics ignored"
              description={<Text style={{ whiteSpace: "pre-wrap" }}>{input.error}</Text>}
              showIcon
            />
          ) : null}

          {parseFailure ? (
            <Alert
              type="warning"
              message="Parse failed"
              description={<Text style={{ whiteSpace: "pre-wrap" }}>{parseFailure.error}</Text>}
              showIcon
            />
          ) : null}

          {warnings.length > 0 ? (
            <Alert
              type="info"
              message={`${warnings.length} warning(s)`}
              description={
                <ul className="pc-warning-list">
                  {warnings.map((w, idx) => (
                    <li key={`${idx}-${w}`}>{w}</li>
                  ))}
                </ul>
              }
              showIcon
            />
          ) : null}
        </Space>
      </Card>

      <Card
        size="small"
        title="Plan Viewer"
        extra={
          tree ? (
            <Text type="secondary">
              operators: <Text code>{tree.nodes.length}</Text>
            </Text>
          ) : (
            <Text type="secondary">Render a plan to view</Text>
          )
        }
      >
        <Space direction="vertical" style={{ width: "100%" }} size={12}>
          {signals && tree ? <PlanSummaryBanner signals={signals} section={tree.section} /> : null}

          <Tabs
            activeKey={view.viewMode}
            onChange={(k) => {
              if (isViewMode(k)) view.setViewMode(k);
            }}
            items={[
              {
                key: "diagram",
                label: "Diagram",
                disabled: diagramDisabled,
                children:
                  tree && view.viewMode === "diagram" ? (
                    <PlanDiagramTree
                      tree={tree}
                      orientation={input.orientation}
                      selectedKey={view.selectedKey}
                      onOpenNode={openNode}
                      focusToken={view.focusToken}
                      collapsedKeys={view.collapsedKeys}
                      onToggleCollapsed={view.toggleCollapsed}
                      onCollapseAll={view.collapseAll}
                      onExpandAll={view.expandAll}
                    />
                  ) : null,
              },
              {
                key: "outline",
                label: "Outline",
                disabled: !tree,
                children: tree ? (
                  <PlanOutlineTree
                    tree={tree}
                    selectedKey={view.selectedKey}
                    onOpenNode={openNode}
                    collapsedKeys={view.collapsedKeys}
                    onToggleCollapsed={view.toggleCollapsed}
                    onCollapseAll={view.collapseAll}
                    onExpandAll={view.expandAll}
                  />
                ) : null,
              },
              {
                key: "raw",
                label: "Raw",
                children: (
                  <pre className="pc-code-block" style={{ margin: 0, maxHeight: 520, overflow: "auto" }}>
                    <code>{input.result?.rawText ?? ""}</code>
                  </pre>
                ),
              },
              {
                key: "document",
                label: "Document",
                children: (
                  <Space direction="vertical" style={{ width: "100%" }} size={12}>
                    <Space wrap>
                      <Text type="secondary">Plan document (JSON)</Text>
                      <CopyIconButton text={documentJson} tooltip="Copy document" />
                      <Text type="secondary">SVG</Text>
                      <CopyIconButton text={svgMarkup} disabled={!exportLayout} tooltip="Copy SVG markup" />
                    </Space>
                    <pre className="pc-code-block" style={{ margin: 0, maxHeight: 320, overflow: "auto" }}>
                      <code>{documentJson}</code>
                    </pre>
                    <TextArea
                      value={documentText}
                      onChange={(e) => setDocumentText(e.target.value)}
                      placeholder="Paste a plan document to load it"
                      autoSize={{ minRows: 3, maxRows: 8 }}
                      className="pc-code-input"
                    />
                    <Button onClick={onLoadDocument} disabled={!documentText.trim()}>
                      Load document
                    </Button>
                    {documentError ? (
                      <Alert
                        type="error"
                        message="Invalid document"
                        description={<Text style={{ whiteSpace: "pre-wrap" }}>{documentError}</Text>}
                        showIcon
                      />
                    ) : null}
                  </Space>
                ),
              },
            ]}
          />
        </Space>
      </Card>

      <PlanNodeDrawer open={view.drawerOpen} node={selectedNode} onClose={view.closeDrawer} />
    </Space>
  );
}
