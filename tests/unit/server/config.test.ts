import { describe, it, expect } from 'vitest';
import { loadServerConfig, parseCliArgs } from '../../../src/server/config.js';
import { ValidationError } from '../../../src/utils/validation.js';

const HOME = '/home/tester';

describe('loadServerConfig', () => {
  it('reads paths from the environment and fills defaults', () => {
    const config = loadServerConfig(
      { SCHOOLS_DB_PATH: '~/cps.sqlite', WEBSITES_DB_PATH: '/data/websites.sqlite' },
      [],
      HOME
    );

    expect(config).toEqual({
      schoolsDbPath: '/home/tester/cps.sqlite',
      websitesDbPath: '/data/websites.sqlite',
      websitesTable: 'webpagechunk',
      embedding: {
        endpoint: 'http://127.0.0.1:8080',
        model: 'nomic-ai/nomic-embed-text-v1.5',
        dimensions: 768,
      },
      reranker: {
        endpoint: 'http://127.0.0.1:8081',
        model: 'answerdotai/answerai-colbert-small-v1',
      },
      searchCandidateLimit: 10,
    });
  });

  it('lets CLI flags override the environment', () => {
    const config = loadServerConfig(
      { SCHOOLS_DB_PATH: '/env/cps.sqlite', WEBSITES_DB_PATH: '/env/websites.sqlite' },
      ['--sqlite-path', '/cli/cps.sqlite', '--vector-db-path', '~/websites.sqlite'],
      HOME
    );
    expect(config.schoolsDbPath).toBe('/cli/cps.sqlite');
    expect(config.websitesDbPath).toBe('/home/tester/websites.sqlite');
  });

  it('applies model and search overrides', () => {
    const config = loadServerConfig(
      {
        SCHOOLS_DB_PATH: '/a.sqlite',
        WEBSITES_DB_PATH: '/b.sqlite',
        WEBSITES_TABLE: 'chunks',
        EMBEDDING_ENDPOINT: 'http://gpu-box:9000',
        EMBEDDING_MODEL: 'custom-embedder',
        EMBEDDING_DIMENSIONS: '384',
        RERANKER_MODEL: 'custom-reranker',
        SEARCH_CANDIDATE_LIMIT: '40',
      },
      [],
      HOME
    );
    expect(config.websitesTable).toBe('chunks');
    expect(config.embedding).toEqual({
      endpoint: 'http://gpu-box:9000',
      model: 'custom-embedder',
      dimensions: 384,
    });
    expect(config.reranker.model).toBe('custom-reranker');
    expect(config.searchCandidateLimit).toBe(40);
  });

  it('names every missing store path', () => {
    expect(() => loadServerConfig({}, [], HOME)).toThrow(
      'schoolsDbPath: SCHOOLS_DB_PATH (or --sqlite-path) is required; ' +
        'websitesDbPath: WEBSITES_DB_PATH (or --vector-db-path) is required'
    );
  });

  it('rejects an out-of-range candidate limit', () => {
    expect(() =>
      loadServerConfig(
        { SCHOOLS_DB_PATH: '/a.sqlite', WEBSITES_DB_PATH: '/b.sqlite', SEARCH_CANDIDATE_LIMIT: '0' },
        [],
        HOME
      )
    ).toThrow(ValidationError);
  });

  it('rejects a table name that is not an identifier', () => {
    expect(() =>
      loadServerConfig(
        { SCHOOLS_DB_PATH: '/a.sqlite', WEBSITES_DB_PATH: '/b.sqlite', WEBSITES_TABLE: 'x; DROP' },
        [],
        HOME
      )
    ).toThrow('websitesTable: WEBSITES_TABLE must be a plain SQL identifier');
  });
});

describe('parseCliArgs', () => {
  it('returns undefined for absent flags', () => {
    expect(parseCliArgs([])).toEqual({ sqlitePath: undefined, vectorDbPath: undefined });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--lance-path', 'x'])).toThrow();
  });
});
