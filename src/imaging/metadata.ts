import { gunzipSync } from "zlib";
import { DecodeError, RemoteFetchError } from "../errors";
import { createLogger } from "../utils/log";
import { errorMessage } from "../utils/errors";
import { ImagingService } from "./service";
import { ImageSetMetadata, ImageSetMetadataSchema } from "./metadataSchema";

const log = createLogger("metadata");

export interface ResolvedMetadata {
  /** Typed view used for enumeration. */
  metadata: ImageSetMetadata;
  /** The document exactly as parsed, persisted as metadata.json. */
  document: unknown;
}

function decodeMetadata(blob: Uint8Array, imageSetId: string): ResolvedMetadata {
  let text: string;
  try {
    text = gunzipSync(blob).toString("utf8");
  } catch (error) {
    throw new DecodeError(
      `Metadata for ImageSet ${imageSetId} is not valid gzip: ${errorMessage(error)}`,
      imageSetId,
      error
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      `Metadata for ImageSet ${imageSetId} is not valid JSON: ${errorMessage(error)}`,
      imageSetId,
      error
    );
  }

  const parsed = ImageSetMetadataSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
      .join("; ");
    throw new DecodeError(
      `Metadata for ImageSet ${imageSetId} has an unexpected shape: ${issues}`,
      imageSetId,
      parsed.error
    );
  }
  return { metadata: parsed.data, document };
}

export class MetadataResolver {
  constructor(private readonly service: ImagingService) {}

  async resolve(datastoreId: string, imageSetId: string): Promise<ResolvedMetadata> {
    log.info(`Fetching metadata for ImageSet: ${imageSetId}`);

    let blob: Uint8Array;
    try {
      blob = await this.service.getImageSetMetadata(datastoreId, imageSetId);
    } catch (error) {
      throw new RemoteFetchError(
        `Failed to fetch metadata for ImageSet ${imageSetId}: ${errorMessage(error)}`,
        datastoreId,
        imageSetId,
        undefined,
        error
      );
    }

    return decodeMetadata(blob, imageSetId);
  }
}
