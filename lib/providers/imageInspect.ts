import sharp from "sharp";
import { ProviderError } from "../batch/errors";

export type InspectedImage = {
  format: string;
  width: number;
  height: number;
};

export async function inspectImage(bytes: Buffer): Promise<InspectedImage> {
  if (bytes.length === 0) {
    throw new ProviderError("Provider returned an empty image");
  }
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (error) {
    throw new ProviderError("Provider returned bytes that are not a decodable image", { cause: error });
  }
  if (!metadata.format || !metadata.width || !metadata.height) {
    throw new ProviderError("Provider returned an image without dimensions");
  }
  return { format: metadata.format, width: metadata.width, height: metadata.height };
}
