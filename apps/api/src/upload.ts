import { z } from "zod";
import { PayloadTooLargeError, type UploadedFile } from "@core";

const MB = 1024 * 1024;

export const FilePayload = z.object({
  name: z.string().min(1),
  mime: z.string().optional(),
  data_base64: z.string().min(1),
});
export type FilePayload = z.infer<typeof FilePayload>;

export const SingleFileBody = z.object({ file: FilePayload });
export const MultiFileBody = z.object({ files: z.array(FilePayload).min(1) });

export const PdfToJpgBody = SingleFileBody.extend({ pages: z.string().optional() });
export const SplitBody = SingleFileBody.extend({ ranges: z.string().min(1) });
export const RotateBody = SingleFileBody.extend({ angle: z.coerce.number().int().default(90) });
export const ProtectBody = SingleFileBody.extend({ password: z.string().min(1) });
export const UnlockBody = SingleFileBody.extend({ password: z.string().default("") });

function formatMb(bytes: number): string {
  return String(Math.round((bytes / MB) * 10) / 10);
}

/** Decode base64 payloads, rejecting the request when the decoded total exceeds `limitBytes`. */
export function decodeFiles(payloads: readonly FilePayload[], limitBytes: number): UploadedFile[] {
  const files = payloads.map((p) => ({
    name: p.name,
    mime: p.mime,
    data: Buffer.from(p.data_base64, "base64"),
  }));
  const total = files.reduce((sum, f) => sum + f.data.length, 0);
  if (total > limitBytes) {
    throw new PayloadTooLargeError(`Total upload size (${formatMb(total)} MB) exceeds allowed ${formatMb(limitBytes)} MB.`);
  }
  return files;
}

/** express.json limit large enough for the biggest tool limit once base64-encoded. */
export function jsonBodyLimit(limitBytes: number): number {
  return Math.ceil((limitBytes * 4) / 3) + MB;
}
