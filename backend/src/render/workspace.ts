import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export interface RenderWorkspace {
  dir: string;
  cleanup: () => Promise<void>;
}

export async function createRenderWorkspace(): Promise<RenderWorkspace> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flashcut-render-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}
