import { z } from 'zod';

/**
 * 瀑布图历史中的一行（本地与远端强度的合成）
 */
export const SpectralSnapshotSchema = z.object({
  timestamp: z.number(),
  intensity: z.array(z.number()),
});

export type SpectralSnapshot = z.infer<typeof SpectralSnapshotSchema>;
