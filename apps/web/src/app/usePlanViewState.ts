import { useCallback, useReducer } from "react";
import { toggleKey } from "../plan/utils";

export type PlanViewMode = "diagram" | "outline" | "raw" | "document";

export interface PlanViewSnapshot {
  selectedKey: string | null;
  drawerOpen: boolean;
  collapsedKeys: Set<string>;
  focusToken: number;
  viewMode: PlanViewMode;
}

type PlanViewAction =
  | { type: "select"; key: string }
  | { type: "openNode"; key: string; ancestorKeys?: readonly string[] }
  | { type: "closeDrawer" }
  | { type: "clearSelection" }
  | { type: "toggleCollapsed"; key: string }
  | { type: "collapseAll"; keys: Iterable<string> }
  | { type: "expandAll" }
  | { type: "setViewMode"; mode: PlanViewMode }
  | { type: "reset" };

export function createInitialPlanViewSnapshot(viewMode: PlanViewMode = "diagram"): PlanViewSnapshot {
  return {
    selectedKey: null,
    drawerOpen: false,
    collapsedKeys: new Set(),
    focusToken: 0,
    viewMode,
  };
}

export function reducePlanViewSnapshot(
  state: PlanViewSnapshot,
  action: PlanViewAction
): PlanViewSnapshot {
  switch (action.type) {
    case "select":
      return { ...state, selectedKey: action.key };
    case "openNode": {
      let collapsedKeys = state.collapsedKeys;
      const hidden = (action.ancestorKeys ?? []).filter((k) => collapsedKeys.has(k));
      if (hidden.length > 0) {
        collapsedKeys = new Set(collapsedKeys);
        for (const k of hidden) collapsedKeys.delete(k);
      }
      return {
        ...state,
        selectedKey: action.key,
        drawerOpen: true,
        collapsedKeys,
        focusToken: state.focusToken + 1,
      };
    }
    case "closeDrawer":
      return { ...state, drawerOpen: false };
    case "clearSelection":
      return { ...state, selectedKey: null, drawerOpen: false };
    case "toggleCollapsed":
      return { ...state, collapsedKeys: toggleKey(state.collapsedKeys, action.key) };
    case "collapseAll":
      return { ...state, collapsedKeys: new Set(action.keys) };
    case "expandAll":
      return { ...state, collapsedKeys: new Set() };
    case "setViewMode":
      return { ...state, viewMode: action.mode };
    case "reset":
      return createInitialPlanViewSnapshot(state.viewMode);
    default:
      return state;
  }
}

export interface PlanViewState extends PlanViewSnapshot {
  selectNode: (key: string) => void;
  openNode: (key: string, ancestorKeys?: readonly string[]) => void;
  closeDrawer: () => void;
  clearSelection: () => void;
  toggleCollapsed: (key: string) => void;
  collapseAll: (keys: Iterable<string>) => void;
  expandAll: () => void;
  setViewMode: (mode: PlanViewMode) => void;
  reset: () => void;
}

export function usePlanViewState(): PlanViewState {
  const [state, dispatch] = useReducer(reducePlanViewSnapshot, undefined, () =>
    createInitialPlanViewSnapshot()
  );

  const selectNode = useCallback((key: string) => dispatch({ type: "select", key }), []);
  const openNode = useCallback(
    (key: string, ancestorKeys?: readonly string[]) =>
      dispatch({ type: "openNode", key, ancestorKeys }),
    []
  );
  const closeDrawer = useCallback(() => dispatch({ type: "closeDrawer" }), []);
  const clearSelection = useCallback(() => dispatch({ type: "clearSelection" }), []);
  const toggleCollapsed = useCallback((key: string) => dispatch({ type: "toggleCollapsed", key }), []);
  const collapseAll = useCallback((keys: Iterable<string>) => dispatch({ type: "collapseAll", keys }), []);
  const expandAll = useCallback(() => dispatch({ type: "expandAll" }), []);
  const setViewMode = useCallback((mode: PlanViewMode) => dispatch({ type: "setViewMode", mode }), []);
  const reset = useCallback(() => dispatch({ type: "reset" }), []);

  return {
    ...state,
    selectNode,
    openNode,
    closeDrawer,
    clearSelection,
    toggleCollapsed,
    collapseAll,
    expandAll,
    setViewMode,
    reset,
  };
}
