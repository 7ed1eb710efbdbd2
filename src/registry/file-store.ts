import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { CorruptRegistryError, errnoCode, errorToString } from "../errors.js";
import type { Logger } from "../logger.js";
import { RegistryDocumentSchema, findDuplicateName, fromDocument, toDocument } from "./schema.js";
import { emptyRegistry, type Registry, type RegistryStore } from "./types.js";

const REGISTRY_FILE_MODE = 0o600;

/**
 * Registry persisted as a single JSON document. Saves go through a temp file
 * in the same directory and a rename, so a reader sees either the old or the
 * new document and never a partial one.
 */
export class FileRegistryStore implements RegistryStore {
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "registry" });
  }

  async load(): Promise<Registry> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        this.logger.debug({ path: this.path }, "Registry not found, starting empty");
        return emptyRegistry();
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptRegistryError(this.path, errorToString(err), { cause: err });
    }

    const parsed = RegistryDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "(root)";
      throw new CorruptRegistryError(this.path, `${where}: ${issue?.message ?? "invalid document"}`);
    }

    const duplicate = findDuplicateName(parsed.data);
    if (duplicate !== undefined) {
      throw new CorruptRegistryError(this.path, `duplicate agent name '${duplicate}'`);
    }

    return fromDocument(parsed.data);
  }

  async save(registry: Registry): Promise<void> {
    const body = `${JSON.stringify(toDocument(registry), null, 2)}\n`;
    const tmpPath = join(dirname(this.path), `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);

    try {
      await writeFile(tmpPath, body, { mode: REGISTRY_FILE_MODE });
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }

    this.logger.debug({ path: this.path, agents: registry.agents.length }, "Registry saved");
  }
}
