import { defineConfig } from "vite";

export default defineConfig({
  // Relative asset paths so the bundled demo can be served from a subdirectory
  base: "./",
  server: {
    open: true,
    port: 5199,
    strictPort: true, // don't fall through to another port
  },
});
