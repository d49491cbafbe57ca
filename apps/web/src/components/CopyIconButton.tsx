import { CheckOutlined, CopyOutlined } from "@ant-design/icons";
import { Button, Tooltip } from "antd";
import { useEffect, useRef, useState } from "react";
import type { MouseEvent } from "react";
import { createLogger } from "../app/logger";
import { writeTextToClipboard } from "../utils/clipboard";

type CopyStatus = "idle" | "copied" | "failed";

const log = createLogger("clipboard");

const RESET_AFTER_MS = 1200;

export interface CopyIconButtonProps {
  /** Text to copy, or a function producing it on click (for large exports). */
  text: string | (() => string);
  disabled?: boolean;
  tooltip?: string;
  ariaLabel?: string;
}

function statusTitle(status: CopyStatus, tooltip: string): string {
  if (status === "copied") return "Copied";
  if (status === "failed") return "Copy failed";
  return tooltip;
}

export default function CopyIconButton(props: CopyIconButtonProps): JSX.Element {
  const { text, tooltip = "Copy", ariaLabel = tooltip } = props;
  const disabled = props.disabled ?? (typeof text === "string" && !text.trim());

  const [status, setStatus] = useState<CopyStatus>("idle");
  const timerRef = useRef<number | null>(null);

  useEffect(
    () => () => {
      if (timerRef.current != null) window.clearTimeout(timerRef.current);
    },
    []
  );

  const settle = (next: CopyStatus) => {
    setStatus(next);
    if (timerRef.current != null) window.clearTimeout(timerRef.current);
    timerRef.current = window.setTimeout(() => setStatus("idle"), RESET_AFTER_MS);
  };

  const onClick = (e: MouseEvent<HTMLButtonElement>) => {
    e.preventDefault();
    e.stopPropagation();
    if (disabled) return;
    const value = typeof text === "function" ? text() : text;
    writeTextToClipboard(value).then(
      () => settle("copied"),
      (err: unknown) => {
        log.error("copy failed", err);
        settle("failed");
      }
    );
  };

  return (
    <Tooltip title={statusTitle(status, tooltip)}>
      <Button
        type="text"
        size="small"
        icon={status === "copied" ? <CheckOutlined /> : <CopyOutlined />}
        aria-label={ariaLabel}
        onClick={onClick}
        disabled={disabled}
      />
    </Tooltip>
  );
}
