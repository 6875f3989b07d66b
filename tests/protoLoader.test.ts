import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { loadProtos } from "../src/infrastructure/protoLoader.js";

describe("loadProtos", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "protos-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("an absent directory gives an empty root", async () => {
    const { root, report } = await loadProtos(path.join(dir, "absent"));
    expect(report).toEqual([]);
    expect(root.nestedArray).toEqual([]);
  });

  test("loads files, resolves imports from the proto directory and keeps field names", async () => {
    fs.mkdirSync(path.join(dir, "common"));
    fs.writeFileSync(
      path.join(dir, "common", "paging.proto"),
      'syntax = "proto3";\npackage common;\nmessage Page { int32 page_size = 1; }\n',
    );
    fs.writeFileSync(
      path.join(dir, "items.proto"),
      [
        'syntax = "proto3";',
        "package shop;",
        'import "common/paging.proto";',
        "message ListItemsRequest { common.Page page = 1; }",
        "message Item { string item_id = 1; }",
        "service Items { rpc List (ListItemsRequest) returns (stream Item); }",
        "",
      ].join("\n"),
    );

    const { root, report } = await loadProtos(dir);

    expect(report).toEqual([{ file: "items.proto", status: "loaded" }]);
    expect(root.lookupService("shop.Items").methods.List.responseStream).toBe(true);
    expect(Object.keys(root.lookupType("common.Page").fields)).toEqual(["page_size"]);
  });

  test("reports a broken file and keeps the good ones", async () => {
    fs.writeFileSync(path.join(dir, "a_good.proto"), 'syntax = "proto3";\npackage ok;\nmessage Ping { string id = 1; }\n');
    fs.writeFileSync(path.join(dir, "b_bad.proto"), 'syntax = "proto3";\nmessage {\n');

    const { root, report } = await loadProtos(dir);

    expect(report.map(r => [r.file, r.status])).toEqual([
      ["a_good.proto", "loaded"],
      ["b_bad.proto", "skipped"],
    ]);
    expect(report[1].error).toBeTruthy();
    expect(root.lookupType("ok.Ping").name).toBe("Ping");
  });

  test("fails when nothing loads", async () => {
    fs.writeFileSync(path.join(dir, "bad.proto"), "this is not a proto file");
    await expect(loadProtos(dir)).rejects.toThrow();
  });
});
