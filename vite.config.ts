import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const apiPort = process.env.PORT || '3001';

export default defineConfig({
    plugins: [react()],
    server: {
        port: 5173,
        proxy: {
            '/api': `http://localhost:${apiPort}`,
        },
    },
    build: {
        outDir: 'dist',
    },
});
