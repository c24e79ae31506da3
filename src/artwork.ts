import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";

export interface PreparedCover {
  path: string;
  format: "jpeg" | "png";
  width: number;
  height: number;
}

/**
 * Checks a picture pulled out of a source file and makes it embeddable.
 * JPEG and PNG are kept as they are; anything else sharp can decode is
 * re-encoded to JPEG next to the original. Throws when the data isn't an image.
 */
export async function prepareCover(extractedPath: string): Promise<PreparedCover> {
  const stat = await fs.stat(extractedPath);
  if (stat.size === 0) {
    throw new Error("Extracted cover image is empty");
  }

  const metadata = await sharp(extractedPath, { failOnError: true }).metadata();
  const format = metadata.format;
  if (!format || !metadata.width || !metadata.height) {
    throw new Error("Extracted cover is not a readable image");
  }

  if (format === "jpeg" || format === "png") {
    const target = `${extractedPath}.${format === "jpeg" ? "jpg" : "png"}`;
    await fs.rename(extractedPath, target);
    return { path: target, format, width: metadata.width, height: metadata.height };
  }

  const target = path.join(path.dirname(extractedPath), `${path.basename(extractedPath)}.jpg`);
  const info = await sharp(extractedPath, { failOnError: true })
    .rotate()
    .toColorspace("srgb")
    .jpeg({ quality: 92 })
    .toFile(target);

  return { path: target, format: "jpeg", width: info.width, height: info.height };
}

