import { z } from "zod";
import { LanguageInfoSchema } from "@cellterm/kernel-protocol";

export const KernelSpecMetadataSchema = z
  .object({
    name: z.string().optional(),
    display_name: z.string().optional(),
    language: z.string().optional(),
  })
  .passthrough();

export const NotebookMetadataSchema = z
  .object({
    kernelspec: KernelSpecMetadataSchema.optional(),
    language_info: LanguageInfoSchema.optional(),
  })
  .passthrough();

export type KernelSpecMetadata = z.infer<typeof KernelSpecMetadataSchema>;
export type NotebookMetadata = z.infer<typeof NotebookMetadataSchema>;

export const DEFAULT_FILE_EXTENSION = ".py";

/** Notebook metadata from an untrusted document; unusable input yields `{}`. */
export const parseNotebookMetadata = (value: unknown): NotebookMetadata => {
  const parsed = NotebookMetadataSchema.safeParse(value ?? {});
  return parsed.success ? parsed.data : {};
};
