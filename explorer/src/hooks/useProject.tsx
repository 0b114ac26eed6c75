import React from "react";
import {
  ApiError,
  type LoadedProject,
  fetchProject,
  openProject,
  reloadProject,
} from "../api/client";
import { type DatasetMatrix, buildMatrix } from "../engine/matrix";

type ProjectCtx = {
  project: LoadedProject | null;
  matrix: DatasetMatrix;
  loading: boolean;
  error: string | null;
  reload: () => Promise<void>;
  open: (path: string) => Promise<boolean>;
};

const ProjectContext = React.createContext<ProjectCtx | null>(null);

const describeError = (e: unknown) => {
  if (e instanceof ApiError) return e.details ? `${e.message}: ${e.details}` : e.message;
  return e instanceof Error ? e.message : String(e);
};

const EMPTY_MATRIX: DatasetMatrix = new Map();

/** Owns the session's matrix; every page reads datasets from here. */
export const ProjectProvider: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const [project, setProject] = React.useState<LoadedProject | null>(null);
  const [loading, setLoading] = React.useState(true);
  const [error, setError] = React.useState<string | null>(null);

  const run = React.useCallback(async (load: () => Promise<LoadedProject>) => {
    try {
      setLoading(true);
      setProject(await load());
      setError(null);
      return true;
    } catch (e) {
      console.error("Project load failed", e);
      setError(describeError(e));
      return false;
    } finally {
      setLoading(false);
    }
  }, []);

  React.useEffect(() => {
    void run(fetchProject);
  }, [run]);

  const reload = React.useCallback(async () => {
    await run(reloadProject);
  }, [run]);
  const open = React.useCallback((path: string) => run(() => openProject(path)), [run]);

  const matrix = React.useMemo(
    () => (project ? buildMatrix(project.datasets) : EMPTY_MATRIX),
    [project]
  );

  return (
    <ProjectContext.Provider value={{ project, matrix, loading, error, reload, open }}>
      {children}
    </ProjectContext.Provider>
  );
};

export const useProject = () => {
  const ctx = React.useContext(ProjectContext);
  if (!ctx) throw new Error("useProject must be used within ProjectProvider");
  return ctx;
};
