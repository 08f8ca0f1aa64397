import { fileURLToPath } from 'node:url';
import react from '@vitejs/plugin-react';
import { defineConfig } from 'vite';

const simulatorUrl = process.env.SIMULATOR_URL ?? 'http://localhost:5000';

// GET /register is the page itself; only the POST goes to the backend.
const backendRoutes = [
  '/current_time',
  '/meter_reading',
  '/validate_meter',
  '/monthly_history',
  '/query_usage',
  '/api/areas',
  '/reset',
];

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  plugins: [react()],
  build: {
    outDir: 'dist',
    emptyOutDir: true,
  },
  server: {
    proxy: {
      ...Object.fromEntries(backendRoutes.map((route) => [route, { target: simulatorUrl }])),
      '/register': {
        target: simulatorUrl,
        bypass: (req) => (req.method === 'GET' ? req.url : undefined),
      },
    },
  },
});
