import React from "react";
import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";
import App from "./App";
import { ExplorerStoreProvider } from "./hooks/useExplorerStore";
import { ProjectProvider } from "./hooks/useProject";
import { ThemeProvider } from "./theme";
import "./index.css";

const root = document.getElementById("root");
if (!root) throw new Error("Missing #root element");

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <BrowserRouter>
      <ThemeProvider>
        <ProjectProvider>
          <ExplorerStoreProvider>
            <App />
          </ExplorerStoreProvider>
        </ProjectProvider>
      </ThemeProvider>
    </BrowserRouter>
  </React.StrictMode>
);
