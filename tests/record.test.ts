import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { identityFromMetadata, loadModelRecord, parseModelMetadata } from "../src/model/record.js";
import { ModelRecordError } from "../src/utils/errors.js";
import { buildReportHtml } from "./helpers/reportFixture.js";

const SOURCE_FILE = "report_data.html";

const METADATA_YAML = `created_at: 2024-03-01 09:30:00.123456
date_range:
  start: 2023-01-02
  end: '2023-12-25'
data_shape: !!python/tuple
- 52
- 8
model_name: weekly-revenue
`;

describe("parseModelMetadata", () => {
  it("reads timestamps, date ranges and tagged tuples", () => {
    expect(parseModelMetadata(METADATA_YAML, "model_a")).toEqual({
      created_at: "2024-03-01T09:30:00.123Z",
      date_range: { start: "2023-01-02T00:00:00.000Z", end: "2023-12-25" },
      data_shape: [52, 8],
      model_name: "weekly-revenue"
    });
  });

  it("treats an empty document as empty metadata", () => {
    expect(parseModelMetadata("", "model_a")).toEqual({});
  });

  it("wraps YAML syntax errors", () => {
    expect(() => parseModelMetadata("created_at: [unclosed", "model_a")).toThrow(
      new ModelRecordError("Invalid YAML in metadata.yaml for model model_a")
    );
  });

  it("rejects fields of the wrong shape", () => {
    expect(() => parseModelMetadata("data_shape: wide\n", "model_a")).toThrow(
      "Invalid metadata.yaml for model model_a: data_shape: Expected array, received string"
    );
  });
});

describe("identityFromMetadata", () => {
  it("falls back to the folder name for the creation date", () => {
    expect(identityFromMetadata("model_a", { date_range: { start: "2023-01-02" } })).toEqual({
      folder: "model_a",
      createdAt: "model_a",
      periodStart: "2023-01-02",
      periodEnd: null
    });
  });
});

describe("loadModelRecord", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "mmmr-record-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function createModel(folder: string, files: Record<string, string>): Promise<string> {
    const dir = path.join(root, folder);
    await mkdir(dir, { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      await writeFile(path.join(dir, name), content, "utf8");
    }
    return dir;
  }

  it("loads the report text and metadata", async () => {
    const html = buildReportHtml();
    const dir = await createModel("model_20240301", {
      [SOURCE_FILE]: html,
      "metadata.yaml": METADATA_YAML
    });

    const record = await loadModelRecord(dir, { sourceFile: SOURCE_FILE });
    expect(record.path).toBe(dir);
    expect(record.reportText).toBe(html);
    expect(record.identity).toEqual({
      folder: "model_20240301",
      createdAt: "2024-03-01T09:30:00.123Z",
      periodStart: "2023-01-02T00:00:00.000Z",
      periodEnd: "2023-12-25"
    });
  });

  it("uses the folder name when metadata.yaml is absent", async () => {
    const dir = await createModel("model_b", { [SOURCE_FILE]: "<html></html>" });

    const record = await loadModelRecord(dir, { sourceFile: SOURCE_FILE });
    expect(record.metadata).toEqual({ created_at: "model_b" });
    expect(record.identity).toEqual({
      folder: "model_b",
      createdAt: "model_b",
      periodStart: null,
      periodEnd: null
    });
  });

  it("resolves relative model paths", async () => {
    const dir = await createModel("model_c", { [SOURCE_FILE]: "<html></html>" });
    const relative = path.relative(process.cwd(), dir);

    const record = await loadModelRecord(relative, { sourceFile: SOURCE_FILE });
    expect(record.path).toBe(path.resolve(dir));
  });

  it("fails for a missing model folder", async () => {
    const missing = path.join(root, "nope");
    await expect(loadModelRecord(missing, { sourceFile: SOURCE_FILE })).rejects.toThrow(
      new ModelRecordError(`Model folder not found: ${missing}`)
    );
  });

  it("fails when the source report is missing", async () => {
    const dir = await createModel("model_d", { "metadata.yaml": METADATA_YAML });
    await expect(loadModelRecord(dir, { sourceFile: SOURCE_FILE })).rejects.toBeInstanceOf(ModelRecordError);
    await expect(loadModelRecord(dir, { sourceFile: SOURCE_FILE })).rejects.toThrow(
      "Unable to read report report_data.html for model model_d"
    );
  });

  it("fails on invalid metadata", async () => {
    const dir = await createModel("model_e", {
      [SOURCE_FILE]: "<html></html>",
      "metadata.yaml": "created_at: [unclosed"
    });
    await expect(loadModelRecord(dir, { sourceFile: SOURCE_FILE })).rejects.toThrow(
      "Invalid YAML in metadata.yaml for model model_e"
    );
  });
});
