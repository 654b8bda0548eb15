import { ok, err, type Result } from 'neverthrow';
import * as lancedb from '@lancedb/lancedb';
import { z } from 'zod';
import { PAGE_TYPES, type EmbeddedChunk, type School, type SourcePage } from '../types/chunk.js';
import type { SearchFilters } from '../types/search.js';
import { StoreUnavailableError, type StoredMatch, type VectorStore } from '../types/provider.js';
import { errorMessage } from '../utils/logger.js';

const CHUNKS_TABLE = 'chunks';
const PAGES_TABLE = 'pages';
const SCHOOLS_TABLE = 'schools';

const CHUNK_COLUMNS = [
  'id',
  'page_id',
  'chunk_index',
  'school_id',
  'page_type',
  'source_url',
  'text',
  'start_offset',
  'end_offset',
  'metadata',
  'seq',
];

const pageTypeSchema = z.enum(PAGE_TYPES);

const chunkRowSchema = z.object({
  id: z.string(),
  page_id: z.string(),
  chunk_index: z.number(),
  school_id: z.string(),
  page_type: pageTypeSchema,
  source_url: z.string(),
  text: z.string(),
  start_offset: z.number(),
  end_offset: z.number(),
  metadata: z.string(),
  seq: z.number(),
  _distance: z.number().optional(),
});

const chunkMetadataSchema = z
  .object({
    school_id: z.string(),
    page_type: pageTypeSchema,
    source_url: z.string(),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean()]));

const pageRowSchema = z.object({
  id: z.string(),
  url: z.string(),
  school_id: z.string(),
  page_type: pageTypeSchema,
  raw_text: z.string(),
  char_count: z.number(),
});

const schoolRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  domain: z.string(),
});

const sequenceRowSchema = z.object({ id: z.string(), seq: z.number() });

type ChunkRow = z.infer<typeof chunkRowSchema>;

/** SQL string literal for a LanceDB filter expression. */
function literal(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function whereClause(filters?: SearchFilters): string | undefined {
  const parts: string[] = [];
  if (filters?.schoolId !== undefined) {
    parts.push(`school_id = ${literal(filters.schoolId)}`);
  }
  if (filters?.pageType !== undefined) {
    parts.push(`page_type = ${literal(filters.pageType)}`);
  }
  return parts.length > 0 ? parts.join(' AND ') : undefined;
}

function toMatch(row: ChunkRow): StoredMatch {
  const metadata = chunkMetadataSchema.parse(JSON.parse(row.metadata));
  return {
    chunk: {
      id: row.id,
      pageId: row.page_id,
      chunkIndex: row.chunk_index,
      schoolId: row.school_id,
      sourceUrl: row.source_url,
      pageType: row.page_type,
      text: row.text,
      startOffset: row.start_offset,
      endOffset: row.end_offset,
      metadata,
    },
    distance: row._distance ?? 0,
  };
}

/**
 * Embedded on-disk store. Chunks, pages and schools live in three LanceDB
 * tables under `<storagePath>/lancedb`; tables are created on first write.
 */
export class LanceDBStore implements VectorStore {
  private readonly storagePath: string;
  private readonly _dimensions: number;
  private db: lancedb.Connection | null = null;
  private readonly tables = new Map<string, lancedb.Table>();
  private nextSequence = 0;

  constructor(storagePath: string, dimensions: number) {
    this.storagePath = storagePath;
    this._dimensions = dimensions;
  }

  get dimensions(): number {
    return this._dimensions;
  }

  async connect(): Promise<Result<void, StoreUnavailableError>> {
    try {
      await this.open();
      return ok(undefined);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB connect failed: ${errorMessage(error)}`));
    }
  }

  private async open(): Promise<lancedb.Connection> {
    if (this.db) {
      return this.db;
    }
    const db = await lancedb.connect(`${this.storagePath}/lancedb`);
    const names = await db.tableNames();
    for (const name of [CHUNKS_TABLE, PAGES_TABLE, SCHOOLS_TABLE]) {
      if (names.includes(name)) {
        this.tables.set(name, await db.openTable(name));
      }
    }

    const chunks = this.tables.get(CHUNKS_TABLE);
    if (chunks) {
      const rows: unknown[] = await chunks.query().select(['id', 'seq']).toArray();
      for (const row of rows) {
        const { seq } = sequenceRowSchema.parse(row);
        this.nextSequence = Math.max(this.nextSequence, seq + 1);
      }
    }

    this.db = db;
    return db;
  }

  /** Deletes rows matching `filter`, then appends `rows`, creating the table if needed. */
  private async replaceRows(
    name: string,
    filter: string,
    rows: Record<string, unknown>[],
  ): Promise<void> {
    const db = await this.open();
    const table = this.tables.get(name);
    if (!table) {
      this.tables.set(name, await db.createTable(name, rows));
      return;
    }
    await table.delete(filter);
    await table.add(rows);
  }

  private async existingSequences(ids: string[]): Promise<Map<string, number>> {
    const sequences = new Map<string, number>();
    const table = this.tables.get(CHUNKS_TABLE);
    if (!table || ids.length === 0) {
      return sequences;
    }
    const rows: unknown[] = await table
      .query()
      .where(`id IN (${ids.map(literal).join(', ')})`)
      .select(['id', 'seq'])
      .toArray();
    for (const row of rows) {
      const { id, seq } = sequenceRowSchema.parse(row);
      sequences.set(id, seq);
    }
    return sequences;
  }

  async upsert(chunks: EmbeddedChunk[]): Promise<Result<void, StoreUnavailableError>> {
    if (chunks.length === 0) {
      return ok(undefined);
    }
    const wrong = chunks.find((chunk) => chunk.embedding.length !== this._dimensions);
    if (wrong) {
      return err(
        new StoreUnavailableError(
          `Chunk ${wrong.id} has ${wrong.embedding.length} dimensions, store expects ${this._dimensions}`,
        ),
      );
    }

    try {
      await this.open();
      // Last write of a key within one batch wins.
      const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));
      const ids = [...byId.keys()];
      const sequences = await this.existingSequences(ids);

      const rows = [...byId.values()].map((chunk) => ({
        id: chunk.id,
        page_id: chunk.pageId,
        chunk_index: chunk.chunkIndex,
        school_id: chunk.schoolId,
        page_type: chunk.pageType,
        source_url: chunk.sourceUrl,
        text: chunk.text,
        start_offset: chunk.startOffset,
        end_offset: chunk.endOffset,
        metadata: JSON.stringify(chunk.metadata),
        seq: sequences.get(chunk.id) ?? this.nextSequence++,
        vector: chunk.embedding,
      }));

      await this.replaceRows(CHUNKS_TABLE, `id IN (${ids.map(literal).join(', ')})`, rows);
      return ok(undefined);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB upsert failed: ${errorMessage(error)}`));
    }
  }

  async query(
    embedding: number[],
    topK: number,
    filters?: SearchFilters,
  ): Promise<Result<StoredMatch[], StoreUnavailableError>> {
    try {
      await this.open();
      const table = this.tables.get(CHUNKS_TABLE);
      if (!table || topK <= 0) {
        return ok([]);
      }

      let search = table.vectorSearch(embedding).distanceType('cosine').select(CHUNK_COLUMNS);
      const where = whereClause(filters);
      if (where) {
        search = search.where(where);
      }
      const rawRows: unknown[] = await search.limit(topK).toArray();

      const rows = rawRows.map((row) => chunkRowSchema.parse(row));
      rows.sort((a, b) => (a._distance ?? 0) - (b._distance ?? 0) || a.seq - b.seq);
      return ok(rows.map(toMatch));
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB query failed: ${errorMessage(error)}`));
    }
  }

  async upsertPage(page: SourcePage): Promise<Result<void, StoreUnavailableError>> {
    try {
      await this.replaceRows(PAGES_TABLE, `id = ${literal(page.id)}`, [
        {
          id: page.id,
          url: page.url,
          school_id: page.schoolId,
          page_type: page.pageType,
          raw_text: page.rawText,
          char_count: page.charCount,
        },
      ]);
      return ok(undefined);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB page upsert failed: ${errorMessage(error)}`));
    }
  }

  async listPages(filters?: SearchFilters): Promise<Result<SourcePage[], StoreUnavailableError>> {
    try {
      await this.open();
      const table = this.tables.get(PAGES_TABLE);
      if (!table) {
        return ok([]);
      }

      let query = table.query();
      const where = whereClause(filters);
      if (where) {
        query = query.where(where);
      }
      const rawRows: unknown[] = await query.toArray();

      const pages = rawRows.map((raw) => {
        const row = pageRowSchema.parse(raw);
        return {
          id: row.id,
          url: row.url,
          schoolId: row.school_id,
          pageType: row.page_type,
          rawText: row.raw_text,
          charCount: row.char_count,
        };
      });
      pages.sort((a, b) => a.url.localeCompare(b.url));
      return ok(pages);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB listPages failed: ${errorMessage(error)}`));
    }
  }

  async deletePageChunks(pageId: string): Promise<Result<void, StoreUnavailableError>> {
    try {
      await this.open();
      const table = this.tables.get(CHUNKS_TABLE);
      if (table) {
        await table.delete(`page_id = ${literal(pageId)}`);
      }
      return ok(undefined);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB delete failed: ${errorMessage(error)}`));
    }
  }

  async upsertSchools(schools: School[]): Promise<Result<void, StoreUnavailableError>> {
    if (schools.length === 0) {
      return ok(undefined);
    }
    try {
      const byId = new Map(schools.map((school) => [school.id, school]));
      const ids = [...byId.keys()];
      const rows = [...byId.values()].map((school) => ({
        id: school.id,
        name: school.name,
        domain: school.domain ?? '',
      }));
      await this.replaceRows(SCHOOLS_TABLE, `id IN (${ids.map(literal).join(', ')})`, rows);
      return ok(undefined);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB school upsert failed: ${errorMessage(error)}`));
    }
  }

  async listSchools(): Promise<Result<School[], StoreUnavailableError>> {
    try {
      await this.open();
      const table = this.tables.get(SCHOOLS_TABLE);
      if (!table) {
        return ok([]);
      }
      const rawRows: unknown[] = await table.query().toArray();
      const schools = rawRows.map((raw): School => {
        const row = schoolRowSchema.parse(raw);
        return row.domain ? { id: row.id, name: row.name, domain: row.domain } : { id: row.id, name: row.name };
      });
      schools.sort((a, b) => a.id.localeCompare(b.id));
      return ok(schools);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB listSchools failed: ${errorMessage(error)}`));
    }
  }

  async count(): Promise<Result<number, StoreUnavailableError>> {
    try {
      await this.open();
      const table = this.tables.get(CHUNKS_TABLE);
      return ok(table ? await table.countRows() : 0);
    } catch (error) {
      return err(new StoreUnavailableError(`LanceDB count failed: ${errorMessage(error)}`));
    }
  }

  close(): void {
    for (const table of this.tables.values()) {
      table.close();
    }
    this.tables.clear();
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
