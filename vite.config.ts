import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import tailwindcss from 'tailwindcss';
import autoprefixer from 'autoprefixer';

const host = process.env.NADEPOT_HOST || '0.0.0.0';
const port = Number(process.env.NADEPOT_PORT || 5000);

export default defineConfig({
  plugins: [react()],
  css: {
    postcss: {
      plugins: [tailwindcss(), autoprefixer()],
    },
  },
  server: { host, port, strictPort: true },
  preview: { host, port, strictPort: true },
});
