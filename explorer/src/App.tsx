import React, { useState } from "react";
import { Routes, Route, Link, useLocation } from "react-router-dom";
import {
  AlertTriangle,
  BarChart3,
  FolderOpen,
  Info,
  type LucideIcon,
  Moon,
  RefreshCw,
  Sun,
  X,
} from "lucide-react";
import { useProject } from "./hooks/useProject";
import { Explorer } from "./pages/Explorer";
import { FunctionDetail } from "./pages/FunctionDetail";
import { useTheme } from "./theme";

const APP_VERSION = "0.1.0";

const NavLink: React.FC<{ to: string; icon: LucideIcon; label: string }> = ({ to, icon: Icon, label }) => {
  const location = useLocation();
  const isActive = location.pathname === to || (to !== "/" && location.pathname.startsWith(to));

  return (
    <Link
      to={to}
      className={`flex items-center gap-2 px-4 py-2 rounded-lg transition-colors ${
        isActive
          ? "bg-indigo-600 text-white"
          : "text-slate-600 hover:text-slate-900 hover:bg-slate-100 dark:text-slate-400 dark:hover:text-slate-200 dark:hover:bg-slate-800"
      }`}
    >
      <Icon className="w-4 h-4" />
      <span className="text-sm font-medium">{label}</span>
    </Link>
  );
};

const ProjectPanel: React.FC = () => {
  const { project, loading, error, reload, open } = useProject();
  const [path, setPath] = useState("");

  const submit = async (e: React.FormEvent) => {
    e.preventDefault();
    const trimmed = path.trim();
    if (!trimmed) return;
    if (await open(trimmed)) setPath("");
  };

  return (
    <div className="p-4 border-t border-slate-200 dark:border-slate-800 space-y-3 hidden lg:block">
      <div>
        <div className="text-xs text-slate-500 uppercase font-bold mb-1">Project</div>
        <div className="text-sm font-medium truncate" title={project?.projectFile}>
          {project?.name ?? "—"}
        </div>
        {project && (
          <div className="text-xs text-slate-500">
            {project.datasets.length} datasets
            {project.issues.length > 0 && ` · ${project.issues.length} not loaded`}
          </div>
        )}
        {error && (
          <div className="text-xs text-rose-500 flex items-start gap-1 mt-1">
            <AlertTriangle className="w-3 h-3 shrink-0 mt-0.5" />
            <span className="break-all">{error}</span>
          </div>
        )}
      </div>
      <button
        type="button"
        disabled={loading}
        onClick={() => void reload()}
        className="w-full inline-flex items-center justify-center gap-2 text-xs px-2 py-1.5 rounded-md border border-slate-200 hover:bg-slate-50 text-slate-700 disabled:opacity-50 dark:border-slate-700 dark:hover:bg-slate-800 dark:text-slate-200"
      >
        <RefreshCw className={`w-3.5 h-3.5 ${loading ? "animate-spin" : ""}`} /> Reload
      </button>
      <form onSubmit={(e) => void submit(e)} className="flex gap-1">
        <input
          value={path}
          onChange={(e) => setPath(e.target.value)}
          placeholder="path/to/project.json"
          aria-label="Project file path"
          className="min-w-0 flex-1 text-xs px-2 py-1.5 rounded-md border border-slate-200 bg-white dark:border-slate-700 dark:bg-slate-950"
        />
        <button
          type="submit"
          disabled={loading || !path.trim()}
          title="Open project"
          className="px-2 rounded-md border border-slate-200 hover:bg-slate-50 disabled:opacity-50 dark:border-slate-700 dark:hover:bg-slate-800"
        >
          <FolderOpen className="w-3.5 h-3.5" />
        </button>
      </form>
    </div>
  );
};

export default function App() {
  const { theme, toggleTheme } = useTheme();
  const [showAbout, setShowAbout] = useState(false);

  return (
    <div className="flex h-screen bg-slate-50 text-slate-900 dark:bg-slate-950 dark:text-slate-200">
      <aside className="w-16 lg:w-64 border-r border-slate-200 bg-white/60 dark:border-slate-800 dark:bg-slate-900/50 flex flex-col shrink-0">
        <div className="p-4 border-b border-slate-200 dark:border-slate-800 flex items-center justify-center lg:justify-start gap-3">
          <div className="w-8 h-8 bg-indigo-600 rounded-lg flex items-center justify-center shrink-0 font-bold text-white">
            SE
          </div>
          <span className="font-bold text-lg hidden lg:block">Sim Explorer</span>
          <div className="flex-1" />
          <button
            type="button"
            onClick={toggleTheme}
            className="hidden lg:inline-flex items-center justify-center w-9 h-9 rounded-lg border border-slate-200 bg-white hover:bg-slate-50 text-slate-700 dark:border-slate-800 dark:bg-slate-950 dark:hover:bg-slate-900 dark:text-slate-200 transition-colors"
            title={theme === "dark" ? "Switch to Light" : "Switch to Dark"}
          >
            {theme === "dark" ? <Sun className="w-4 h-4" /> : <Moon className="w-4 h-4" />}
          </button>
        </div>

        <nav className="flex-1 p-4 space-y-2">
          <NavLink to="/" icon={BarChart3} label="Explorer" />
        </nav>

        <ProjectPanel />

        <div className="p-4 border-t border-slate-200 dark:border-slate-800">
          <button
            type="button"
            onClick={() => setShowAbout(true)}
            className="flex items-center gap-2 px-4 py-2 rounded-lg transition-colors w-full text-slate-600 hover:text-slate-900 hover:bg-slate-100 dark:text-slate-400 dark:hover:text-slate-200 dark:hover:bg-slate-800"
          >
            <Info className="w-4 h-4" />
            <span className="text-sm font-medium hidden lg:block">About</span>
          </button>
        </div>
      </aside>

      {showAbout && (
        <div className="fixed inset-0 z-50 flex items-center justify-center bg-black/50 backdrop-blur-sm">
          <div className="bg-white dark:bg-slate-900 rounded-2xl shadow-2xl w-full max-w-md mx-4 overflow-hidden">
            <div className="flex items-center justify-between p-6 border-b border-slate-200 dark:border-slate-800">
              <div className="flex items-center gap-3">
                <div className="w-10 h-10 bg-indigo-600 rounded-xl flex items-center justify-center font-bold text-white text-lg">
                  SE
                </div>
                <div>
                  <h2 className="text-lg font-bold">Simulation Explorer</h2>
                  <p className="text-xs text-slate-500">Multi-dataset timing comparison</p>
                </div>
              </div>
              <button
                type="button"
                onClick={() => setShowAbout(false)}
                className="p-2 rounded-lg hover:bg-slate-100 dark:hover:bg-slate-800 transition-colors"
              >
                <X className="w-5 h-5" />
              </button>
            </div>

            <div className="p-6 space-y-4">
              <div className="bg-slate-50 dark:bg-slate-800/50 rounded-xl p-4">
                <div className="text-xs text-slate-500 mb-1">Version</div>
                <div className="font-mono font-bold text-indigo-600 dark:text-indigo-400">v{APP_VERSION}</div>
              </div>
              <div className="bg-slate-50 dark:bg-slate-800/50 rounded-xl p-4">
                <div className="text-xs text-slate-500 mb-2">Description</div>
                <p className="text-sm text-slate-700 dark:text-slate-300">
                  Compares per-function timings of simulation runs laid out on a threads × simulations
                  matrix. Every selected run is divided by a baseline run, chosen as one cell, a whole row
                  or a whole column.
                </p>
              </div>
              <div className="bg-slate-50 dark:bg-slate-800/50 rounded-xl p-4">
                <div className="text-xs text-slate-500 mb-2">Features</div>
                <ul className="text-sm text-slate-700 dark:text-slate-300 space-y-1">
                  <li>• Single, row and column baselines</li>
                  <li>• Per-function ratio chart with deviation bars</li>
                  <li>• Statistics and invalid-ratio reporting</li>
                  <li>• PNG & PDF export</li>
                </ul>
              </div>
            </div>
          </div>
        </div>
      )}

      <div className="flex-1 min-w-0 h-full overflow-hidden relative">
        <Routes>
          <Route path="/" element={<Explorer />} />
          <Route path="/functions/:name" element={<FunctionDetail />} />
        </Routes>
      </div>
    </div>
  );
}
