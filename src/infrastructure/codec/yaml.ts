import yaml from "js-yaml";
import { createMessageNormalizer } from "./protoJson.js";
import type { DelimitedCodec } from "./types.js";

const normalize = createMessageNormalizer();

/**
 * YAML rendering for humans poking at the gateway with curl. Streamed
 * elements are separated as YAML documents.
 */
export const yamlCodec: DelimitedCodec = {
  marshal(value: unknown): Uint8Array {
    return Buffer.from(yaml.dump(normalize(value), { noRefs: true }), "utf8");
  },
  unmarshal(data: Uint8Array): unknown {
    return yaml.load(Buffer.from(data).toString("utf8"));
  },
  contentType(): string {
    return "application/yaml";
  },
  delimiter(): Uint8Array {
    return Buffer.from("---\n");
  },
};
