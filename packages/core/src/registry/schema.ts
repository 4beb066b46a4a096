import { z } from 'zod';
import { REGISTRY_VERSION } from '@jellyfzf/shared';

export const serverSchema = z.object({
  name: z.string().trim().min(1).max(64),
  url: z.string().url().refine(value => /^https?:\/\//i.test(value), 'URL must use http or https'),
  username: z.string().min(1),
  userId: z.string().min(1),
  accessToken: z.string().min(1),
});

export const registryRecordSchema = z
  .object({
    version: z.literal(REGISTRY_VERSION),
    active: z.string().nullable().default(null),
    servers: z.array(serverSchema),
  })
  .superRefine((record, ctx) => {
    const seen = new Set<string>();
    record.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['servers', index, 'name'],
          message: `Duplicate server name: ${server.name}`,
        });
      }
      seen.add(server.name);
    });
  });
