/**
 * Unit Tests: Asset catalog
 *
 * @see libs/catalog/AssetCatalog.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { StaticAssetCatalog } from '../../libs/catalog/AssetCatalog.js';
import { NotFoundError } from '../../libs/errors/taxonomy.js';

describe('StaticAssetCatalog', () => {
    it('loads the shipped catalog file', () => {
        const catalog = StaticAssetCatalog.fromFile('config/catalog.json');

        assert.deepStrictEqual(catalog.price('album-coastline'), {
            ref: 'album-coastline',
            title: 'Coastline (full album)',
            amount: 2500,
            currency: 'KES'
        });
        assert.strictEqual(catalog.find('tier-reader-monthly')?.amount, 500);
    });

    it('refuses a path outside the working directory', () => {
        assert.throws(
            () => StaticAssetCatalog.fromFile('../catalog.json'),
            /CATALOG_PATH must resolve within the working directory/
        );
    });

    it('prices known assets and rejects unknown ones', () => {
        const catalog = new StaticAssetCatalog([{ ref: 'asset-a', title: 'Asset A', amount: 1000, currency: 'KES' }]);

        assert.strictEqual(catalog.price('asset-a').amount, 1000);
        assert.strictEqual(catalog.find('asset-z'), undefined);
        assert.throws(
            () => catalog.price('asset-z'),
            (error: unknown) => error instanceof NotFoundError && error.message === 'Unknown asset: asset-z'
        );
    });

    it('refuses duplicate references', () => {
        const entry = { ref: 'asset-a', title: 'Asset A', amount: 1000, currency: 'KES' };
        assert.throws(() => new StaticAssetCatalog([entry, entry]), /Duplicate catalog reference: asset-a/);
    });
});
