import React from "react";

export type Theme = "light" | "dark";

const THEME_KEY = "simexplorer.theme";

export interface ChartColors {
  grid: string;
  axis: string;
  tick: string;
  baseline: string;
  tooltip: React.CSSProperties;
}

export const chartColors = (theme: Theme): ChartColors => {
  const isDark = theme === "dark";
  return {
    grid: isDark ? "#1e293b" : "#e2e8f0",
    axis: isDark ? "#475569" : "#94a3b8",
    tick: isDark ? "#94a3b8" : "#64748b",
    baseline: isDark ? "#e2e8f0" : "#0f172a",
    tooltip: {
      backgroundColor: isDark ? "#0f172a" : "#ffffff",
      borderColor: isDark ? "#334155" : "#e2e8f0",
      color: isDark ? "#f1f5f9" : "#0f172a",
    },
  };
};

const applyThemeToDom = (theme: Theme) => {
  const root = document.documentElement;
  root.classList.toggle("dark", theme === "dark");
  root.style.colorScheme = theme;
};

const readStoredTheme = (): Theme => {
  try {
    const v = localStorage.getItem(THEME_KEY);
    if (v === "light" || v === "dark") return v;
  } catch {
    // storage unavailable (private mode)
  }
  return "dark";
};

type ThemeCtx = {
  theme: Theme;
  colors: ChartColors;
  toggleTheme: () => void;
};

const ThemeContext = React.createContext<ThemeCtx | null>(null);

export const ThemeProvider: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const [theme, setTheme] = React.useState<Theme>(readStoredTheme);

  React.useLayoutEffect(() => {
    applyThemeToDom(theme);
    try {
      localStorage.setItem(THEME_KEY, theme);
    } catch {
      // storage unavailable (private mode)
    }
  }, [theme]);

  const toggleTheme = React.useCallback(
    () => setTheme((prev) => (prev === "dark" ? "light" : "dark")),
    []
  );
  const colors = React.useMemo(() => chartColors(theme), [theme]);

  return (
    <ThemeContext.Provider value={{ theme, colors, toggleTheme }}>
      {children}
    </ThemeContext.Provider>
  );
};

export const useTheme = () => {
  const ctx = React.useContext(ThemeContext);
  if (!ctx) throw new Error("useTheme must be used within ThemeProvider");
  return ctx;
};
