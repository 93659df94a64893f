import { defineConfig, loadEnv } from "vite";
import react from "@vitejs/plugin-react";
import tailwindcss from "@tailwindcss/vite";

const BACKEND_PATHS = ["/stream", "/status", "/toggle", "/select", "/record", "/toggle_stream", "/camera", "/socket.io"];

export default defineConfig(({ mode }) => {
  // Load env file from the repository root
  const env = loadEnv(mode, process.cwd(), '');
  const backend = env.VITE_API_BACKEND_URL || 'http://localhost:8800';

  return {
    root: 'frontend',
    plugins: [react(), tailwindcss()],
    build: {
      outDir: 'dist',
      emptyOutDir: true,
    },
    server: {
      host: true,
      port: 5173,
      strictPort: true,
      // Same-origin in development so the control page can use relative URLs
      proxy: Object.fromEntries(
        BACKEND_PATHS.map((path) => [path, { target: backend, ws: path === '/socket.io' }]),
      ),
    },
  };
});
