import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

export interface ScoreStore {
  load(): Promise<Map<string, number>>;
  save(scores: ReadonlyMap<string, number>): Promise<void>;
}

const scoresFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string().optional(),
  scores: z.record(z.string(), z.number().finite()),
});

export class JsonScoreStore implements ScoreStore {
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async load(): Promise<Map<string, number>> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (err) {
      if (isNotFound(err)) return new Map();
      throw err;
    }
    const parsed = scoresFileSchema.parse(JSON.parse(raw));
    return new Map(Object.entries(parsed.scores));
  }

  async save(scores: ReadonlyMap<string, number>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const body = JSON.stringify(
      {
        version: 1,
        updatedAt: new Date().toISOString(),
        scores: Object.fromEntries(scores),
      },
      null,
      2
    );
    // Replaced atomically via rename.
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, body, "utf8");
    await rename(tmp, this.path);
  }
}

export class MemoryScoreStore implements ScoreStore {
  private scores = new Map<string, number>();

  constructor(initial?: Iterable<[string, number]>) {
    if (initial) this.scores = new Map(initial);
  }

  async load(): Promise<Map<string, number>> {
    return new Map(this.scores);
  }

  async save(scores: ReadonlyMap<string, number>): Promise<void> {
    this.scores = new Map(scores);
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
