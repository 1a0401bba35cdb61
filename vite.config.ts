import path from 'path';
import { defineConfig } from 'vite';

// Two passes: `--mode worker` emits a classic-script sw.js (service workers
// cannot rely on module support), `--mode page` emits the shell's app.js.
export default defineConfig(({ mode }) => {
  const isWorker = mode === 'worker';

  return {
    publicDir: false,
    build: {
      outDir: 'pwa',
      emptyOutDir: false,
      lib: {
        entry: path.resolve(__dirname, isWorker ? 'src/worker/service-worker.ts' : 'src/renderer/main.ts'),
        name: isWorker ? 'offlineCache' : 'trainerShell',
        formats: isWorker ? ['iife'] : ['es'],
        fileName: () => (isWorker ? 'sw.js' : 'app.js')
      }
    }
  };
});
