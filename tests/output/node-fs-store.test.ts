import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeFsDatasourceStore } from "../../src/output/node-fs-store.js";
import { createRecordingLogger, FakeDatasource } from "../helpers/fake-gis.js";

describe("NodeFsDatasourceStore", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "geotool-store-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const touch = (name: string) => fs.writeFileSync(path.join(root, name), "x");

  it("removes a shapefile together with its sidecar files", () => {
    for (const name of ["roads.shp", "roads.shx", "roads.dbf", "roads.prj", "rivers.dbf"]) touch(name);
    const store = new NodeFsDatasourceStore({ logger: createRecordingLogger() });
    const target = path.join(root, "roads.shp");

    expect(store.exists(target)).toBe(true);
    expect(store.remove(target)).toBe(true);
    expect(fs.readdirSync(root)).toEqual(["rivers.dbf"]);
  });

  it("removes only the target for other formats", () => {
    touch("dem.tif");
    touch("dem.prj");
    const store = new NodeFsDatasourceStore({ logger: createRecordingLogger() });

    expect(store.remove(path.join(root, "dem.tif"))).toBe(true);
    expect(fs.readdirSync(root)).toEqual(["dem.prj"]);
  });

  it("honours configured sidecar extensions", () => {
    const store = new NodeFsDatasourceStore({ sidecarExtensions: [".dbf"] });

    expect(store.relatedFiles("out/roads.shp")).toEqual(["out/roads.shp", "out/roads.dbf"]);
  });

  it("matches sidecar case to an upper-case shapefile extension", () => {
    const store = new NodeFsDatasourceStore({ sidecarExtensions: [".shx", ".dbf"] });

    expect(store.relatedFiles("out/ROADS.SHP")).toEqual(["out/ROADS.SHP", "out/ROADS.SHX", "out/ROADS.DBF"]);
  });

  it("treats a missing target as removed", () => {
    const store = new NodeFsDatasourceStore({ logger: createRecordingLogger() });
    expect(store.remove(path.join(root, "absent.shp"))).toBe(true);
  });

  it("reports a failed removal", () => {
    fs.mkdirSync(path.join(root, "locked.shp"));
    const logger = createRecordingLogger();
    const store = new NodeFsDatasourceStore({ logger });

    expect(store.remove(path.join(root, "locked.shp"))).toBe(false);
    expect(logger.entries[0].level).toBe("error");
    expect(logger.entries[0].message).toBe(`Failed to remove ${path.join(root, "locked.shp")}`);
  });

  it("saves through the datasource", () => {
    const store = new NodeFsDatasourceStore();
    const good = new FakeDatasource();
    const bad = new FakeDatasource("read-only");

    expect(store.save(good, "a.shp")).toBe(true);
    expect(good.savedTo).toEqual(["a.shp"]);
    expect(store.save(bad, "a.shp")).toBe(false);
    expect(bad.lastError).toBe("read-only");
  });
});
