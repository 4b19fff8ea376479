import crypto from "crypto";
import fs from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { FileArtifactStore, imageFileName } from "../src/infrastructure/storage/FileArtifactStore.js";
import { tempDir } from "./fixtures.js";

describe("FileArtifactStore", () => {
  let root: string;
  let store: FileArtifactStore;

  beforeEach(() => {
    root = tempDir();
    store = new FileArtifactStore(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test("should store and read back the answer file", async () => {
    const jobId = uuidv4();
    const filePath = await store.saveAnswerFile(jobId, '[global]\nfqdn = "pve1.example.com"\n');

    expect(filePath).toBe(path.join(root, jobId, "answer.toml"));
    expect(await store.readAnswerFile(jobId)).toBe('[global]\nfqdn = "pve1.example.com"\n');
  });

  test("should return null for unknown jobs", async () => {
    expect(await store.readAnswerFile(uuidv4())).toBeNull();
    expect(await store.getArtifact(uuidv4())).toBeNull();
  });

  test("should refuse ids that are not job ids", async () => {
    await expect(store.saveAnswerFile("../escape", "x")).rejects.toThrow("Invalid job id: ../escape");
    expect(await store.readAnswerFile("../escape")).toBeNull();
    expect(await store.delete("../escape")).toBe(false);
  });

  test("should register an image with its size and checksum", async () => {
    const jobId = uuidv4();
    const imagePath = await store.imageOutputPath(jobId);
    fs.writeFileSync(imagePath, "image-bytes");

    const artifact = await store.registerImage(jobId, imagePath);
    const expectedSha = crypto.createHash("sha256").update("image-bytes").digest("hex");

    expect(path.basename(imagePath)).toBe(imageFileName(jobId));
    expect(artifact).toMatchObject({ jobId, imagePath, sizeBytes: 11, sha256: expectedSha });

    const loaded = await store.getArtifact(jobId);
    expect(loaded?.sha256).toBe(expectedSha);
    expect(loaded?.registeredAt.toISOString()).toBe(artifact.registeredAt.toISOString());
  });

  test("should keep jobs apart", async () => {
    const first = uuidv4();
    const second = uuidv4();
    await store.saveAnswerFile(first, "first");
    await store.saveAnswerFile(second, "second");

    expect(await store.delete(first)).toBe(true);
    expect(await store.readAnswerFile(first)).toBeNull();
    expect(await store.readAnswerFile(second)).toBe("second");
  });

  test("should report deleting nothing", async () => {
    expect(await store.delete(uuidv4())).toBe(false);
  });
});
