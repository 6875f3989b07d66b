export const HTTP_STATUS = {
  OK: 200,
  NO_CONTENT: 204,
  INTERNAL_ERROR: 500,
} as const;

export const HEADERS = {
  CONTENT_TYPE: "Content-Type",
  TRANSFER_ENCODING: "Transfer-Encoding",
  TRAILER: "Trailer",
} as const;

export const METADATA_HEADER_PREFIX = "Grpc-Metadata-";
export const METADATA_TRAILER_PREFIX = "Grpc-Trailer-";

/** Sent when the codec cannot even encode the error envelope. */
export const FALLBACK_ERROR_BODY = '{"error":{"code":13,"message":"failed to marshal error message"}}';
