import { z } from "zod";

export const IndexVersionStatus = z.enum([
  "PENDING",
  "RUNNING",
  "READY",
  "FAILED",
]);
export type IndexVersionStatus = z.infer<typeof IndexVersionStatus>;

/** Contents of `<catalogPrefix>/<ragId>/<versionId>/version.json`. */
export const VersionMetadataSchema = z.object({
  versionId: z.string().min(1).optional(),
  status: IndexVersionStatus,
  createdAt: z.iso.datetime({ offset: true }),
  sourcePrefix: z.string().optional(),
});

export type VersionMetadata = z.infer<typeof VersionMetadataSchema>;
