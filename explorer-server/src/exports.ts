import fs from "fs/promises";
import path from "path";
import { v4 as uuidv4 } from "uuid";

const EXTENSION_BY_MIME: Record<string, string> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "application/pdf": ".pdf",
};

export function parseDataUri(dataUri: string): { mime: string; bytes: Buffer } | null {
  const m = /^data:([^;,]+)[^,]*;base64,(.*)$/s.exec(dataUri);
  if (!m) return null;
  return { mime: m[1], bytes: Buffer.from(m[2], "base64") };
}

/**
 * Reduces a client-supplied name to a base name with only
 * `[A-Za-z0-9._-]`, forcing the extension the MIME type implies.
 */
export function safeExportName(filename: string, mime: string): string {
  const ext = EXTENSION_BY_MIME[mime] ?? ".bin";
  const base = path
    .basename(filename.replace(/\\/g, "/"))
    .replace(/\.[A-Za-z0-9]+$/, "")
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^[._]+/, "");
  return `${base || `export-${uuidv4()}`}${ext}`;
}

export async function writeExport(
  exportDir: string,
  filename: string,
  dataUri: string
): Promise<string> {
  const parsed = parseDataUri(dataUri);
  if (!parsed) throw new Error("Malformed data URI");
  const target = path.join(exportDir, safeExportName(filename, parsed.mime));
  await fs.mkdir(exportDir, { recursive: true });
  await fs.writeFile(target, parsed.bytes);
  console.log(`✅ Exported ${target} (${parsed.bytes.length} bytes)`);
  return target;
}
