import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { NotFoundError } from '../errors/taxonomy.js';
import { logger } from '../logging/logger.js';

const CatalogEntrySchema = z.object({
    ref: z.string().min(1).max(64),
    title: z.string().min(1),
    /** Minor units */
    amount: z.number().int().positive(),
    currency: z.string().length(3).regex(/^[A-Z]{3}$/)
});

const CatalogFileSchema = z.object({
    assets: z.array(CatalogEntrySchema).min(1)
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

/**
 * Read-only view of what can be bought, and at what price.
 */
export interface AssetCatalog {
    find(assetRef: string): CatalogEntry | undefined;
    /**
     * @throws NotFoundError for an unknown asset or tier reference
     */
    price(assetRef: string): CatalogEntry;
}

export class StaticAssetCatalog implements AssetCatalog {
    private readonly entries: ReadonlyMap<string, CatalogEntry>;

    constructor(entries: readonly CatalogEntry[]) {
        const byRef = new Map<string, CatalogEntry>();
        for (const entry of entries) {
            if (byRef.has(entry.ref)) {
                throw new Error(`Duplicate catalog reference: ${entry.ref}`);
            }
            byRef.set(entry.ref, entry);
        }
        this.entries = byRef;
    }

    /**
     * Load a catalog file. Relative paths resolve against the working directory and must stay inside it.
     */
    public static fromFile(catalogPath: string): StaticAssetCatalog {
        const cwd = process.cwd();
        const resolved = path.resolve(cwd, catalogPath);
        if (!path.isAbsolute(catalogPath) && !resolved.startsWith(`${cwd}${path.sep}`)) {
            throw new Error('CATALOG_PATH must resolve within the working directory');
        }

        const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
        const parsed = CatalogFileSchema.safeParse(raw);
        if (!parsed.success) {
            const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            throw new Error(`Invalid asset catalog at ${resolved}: ${details.join('; ')}`);
        }

        logger.info({ path: resolved, assets: parsed.data.assets.length }, 'Asset catalog loaded');
        return new StaticAssetCatalog(parsed.data.assets);
    }

    public find(assetRef: string): CatalogEntry | undefined {
        return this.entries.get(assetRef);
    }

    public price(assetRef: string): CatalogEntry {
        const entry = this.find(assetRef);
        if (!entry) {
            throw new NotFoundError(`Unknown asset: ${assetRef}`);
        }
        return entry;
    }
}
