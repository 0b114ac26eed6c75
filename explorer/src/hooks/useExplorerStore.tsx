import React from "react";
import {
  type SelectionAction,
  type SelectionState,
  initialSelectionState,
  selectionReducer,
} from "../engine/selection";

type ExplorerCtx = {
  state: SelectionState;
  dispatch: React.Dispatch<SelectionAction>;
};

const ExplorerContext = React.createContext<ExplorerCtx | null>(null);

export const ExplorerStoreProvider: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const [state, dispatch] = React.useReducer(selectionReducer, initialSelectionState);
  return (
    <ExplorerContext.Provider value={{ state, dispatch }}>{children}</ExplorerContext.Provider>
  );
};

export function useExplorerStore() {
  const ctx = React.useContext(ExplorerContext);
  if (!ctx) throw new Error("useExplorerStore must be used within ExplorerStoreProvider");
  return ctx;
}
