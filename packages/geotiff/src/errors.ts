/** Base class for every error raised while reading a COG. */
export class CogError extends Error {
  override name = "CogError";
}

/**
 * The file is not a well-formed TIFF/GeoTIFF.
 *
 * `field` names the tag or structure that failed validation.
 */
export class FormatError extends CogError {
  override name = "FormatError";

  constructor(
    readonly field: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`invalid format: ${field}: ${message}`, options);
  }
}

/** The file is valid but uses a feature this reader does not implement. */
export class UnsupportedFeatureError extends CogError {
  override name = "UnsupportedFeatureError";

  constructor(message: string) {
    super(`unsupported feature: ${message}`);
  }
}

/** The byte source failed to deliver the requested range. */
export class TransportError extends CogError {
  override name = "TransportError";
}

/**
 * The byte source ended before the requested range was complete.
 *
 * `bytes` holds what was read before the data ran out.
 */
export class ShortReadError extends TransportError {
  override name = "ShortReadError";

  constructor(
    readonly offset: number,
    readonly requested: number,
    readonly bytes: Uint8Array,
  ) {
    super(
      `read of ${requested} bytes at offset ${offset} returned ${bytes.length} bytes; did the read pass the end of the file?`,
    );
  }
}

/** A decoded tile holds fewer samples than its pixel region needs. */
export class InsufficientDataError extends CogError {
  override name = "InsufficientDataError";
}

/** The caller asked for a level or window the file does not have. */
export class InvalidRequestError extends CogError {
  override name = "InvalidRequestError";
}

/** The file carries no GeoKey parameter arrays to build a CRS from. */
export class CrsUnavailableError extends CogError {
  override name = "CrsUnavailableError";
}
