import { readFileSync } from 'node:fs';
import { z } from 'zod';

const packageManifestSchema = z.object({
  version: z.string().trim().min(1)
});

export const getPackageVersion = (): string => {
  try {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
    const parsed = packageManifestSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data.version;
    }
  } catch {
    // Running from a layout without a package.json beside dist/ or src/.
  }

  return '0.0.0';
};
