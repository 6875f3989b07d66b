import fs from "fs";
import path from "path";
import protobuf from "protobufjs";

export type ProtoFileStatus = {
  file: string;
  status: "loaded" | "skipped";
  error?: string;
};

export type ProtoLoadResult = {
  root: protobuf.Root;
  report: ProtoFileStatus[];
};

/**
 * Root whose imports resolve relative to the importing file first and to
 * `protoDir` second, so `import "common/types.proto"` works from any file.
 */
function createRoot(protoDir: string): protobuf.Root {
  const root = new protobuf.Root();
  const isFile = (p: string) => fs.existsSync(p) && fs.statSync(p).isFile();
  root.resolvePath = (origin, target) => {
    if (path.isAbsolute(target)) return target;
    if (origin) {
      const rel = path.resolve(path.dirname(origin), target);
      if (isFile(rel)) return rel;
    }
    return path.resolve(protoDir, target);
  };
  return root;
}

/**
 * Load every .proto file in `protoDir` into one root.
 *
 * A file that fails to parse is reported as skipped instead of failing the
 * whole load, unless nothing loads at all.
 */
export async function loadProtos(protoDir: string): Promise<ProtoLoadResult> {
  const report: ProtoFileStatus[] = [];
  if (!fs.existsSync(protoDir)) return { root: createRoot(protoDir), report };

  const files = fs.readdirSync(protoDir).filter(f => f.endsWith(".proto")).sort();
  const root = createRoot(protoDir);
  let firstError: unknown;

  for (const file of files) {
    try {
      await root.load(path.join(protoDir, file), { keepCase: true });
      report.push({ file, status: "loaded" });
    } catch (e) {
      firstError ??= e;
      report.push({ file, status: "skipped", error: e instanceof Error ? e.message : String(e) });
    }
  }

  if (files.length > 0 && !report.some(r => r.status === "loaded")) throw firstError;
  root.resolveAll();
  return { root, report };
}
