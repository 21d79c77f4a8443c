/**
 * Tests for generated file checks and the health documents
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import type { ApiConfig } from '../../config/config.js';
import { RelationshipBuilder } from '../../core/relationship-builder.js';
import { ApiWriter } from '../../rendering/api-writer.js';
import { validateApiFiles, validateDeployment } from '../../rendering/api-validation.js';
import { EndpointGenerator } from '../../rendering/endpoint-generator.js';
import { collectApiStats, writeHealthDocuments } from '../../rendering/health.js';
import { TestHelpers } from '../setup.js';

const BASE = 'https://api.test/v1';

/**
 * Render a small graph with an indicator no tool measures and a tool that
 * measures nothing
 */
async function renderApi(config: ApiConfig): Promise<void> {
  const indicators = [
    TestHelpers.indicator('license', { dimension: 'legal' }),
    TestHelpers.indicator('citation')
  ];
  const tools = [
    TestHelpers.tool('howfairis', { ring: 'adopt', relatedIndicators: ['license'] }),
    TestHelpers.tool('lonely')
  ];
  const dimensions = [TestHelpers.dimension('legal', { indicators: ['license'] })];

  const builder = new RelationshipBuilder();
  builder.addIndicators(indicators);
  builder.addTools(tools);
  builder.addDimensions(dimensions);
  builder.buildAllRelationships();

  const writer = new ApiWriter(config.apiDir);
  const generator = new EndpointGenerator(config, writer);
  await generator.generateRoot();
  await generator.generateIndicators(indicators, builder);
  await generator.generateTools(tools, builder);
  await generator.generateDimensions(dimensions, builder);
  await generator.generateRelationshipsGraph(builder);
  await generator.generateOpenApiSpec();
  await writeHealthDocuments(config, writer, 'run-1');
}

describe('Generated API checks', () => {
  let tempDir: string;
  let writer: ApiWriter;

  beforeEach(async () => {
    tempDir = await TestHelpers.createTempDir();
    writer = new ApiWriter(tempDir);
  });

  afterEach(async () => {
    await TestHelpers.removeTempDir(tempDir);
  });

  describe('validateApiFiles', () => {
    test('should list every missing required file', async () => {
      await writer.writeJson('index.json', {});
      await writer.writeJson('tools/index.json', {});

      expect(await validateApiFiles(tempDir)).toEqual({
        valid: false,
        errors: [
          'Missing required API file: indicators/index.json',
          'Missing required API file: dimensions/index.json',
          'Missing required API file: relationships/graph.json'
        ]
      });
    });

    test('should pass when all required files exist', async () => {
      for (const file of ['index.json', 'indicators/index.json', 'tools/index.json', 'dimensions/index.json', 'relationships/graph.json']) {
        await writer.writeJson(file, {});
      }

      expect(await validateApiFiles(tempDir)).toEqual({ valid: true, errors: [] });
    });
  });

  describe('validateDeployment', () => {
    let config: ApiConfig;

    beforeEach(() => {
      config = TestHelpers.config(tempDir);
    });

    test('should pass a freshly rendered API, views without relationships included', async () => {
      await renderApi(config);

      const report = await validateDeployment(config.apiDir, BASE);

      expect(report.errors).toEqual([]);
      expect(report.warnings).toEqual([]);
      expect(report.valid).toBe(true);
      expect(report.passed).toEqual(expect.arrayContaining([
        'Endpoint exists: status.json',
        'Using OpenAPI 3.0.0',
        'Found 2 indicators',
        'Found 2 tools',
        'Found 1 dimensions'
      ]));
    });

    test('should report every link to a file that is not there', async () => {
      await renderApi(config);
      await fs.rm(join(config.apiDir, 'tools/by-indicator/citation.json'));

      const report = await validateDeployment(config.apiDir, BASE);

      expect(report.valid).toBe(false);
      expect(report.errors).toEqual([
        'Broken link in indicators/citation.json: tools -> tools/by-indicator/citation.json',
        'Broken link in indicators/index.json: tools -> tools/by-indicator/citation.json'
      ]);
    });

    test('should report structure, context, OpenAPI and data problems', async () => {
      await writer.writeJson('api/index.json', { '@type': 'APIRoot' });
      await writer.writeJson('api/openapi.json', { openapi: '2.0', info: {} });

      const report = await validateDeployment(join(tempDir, 'api'), BASE);

      expect(report.errors).toEqual([
        'Missing directory: indicators',
        'Missing directory: tools',
        'Missing directory: dimensions',
        'Missing directory: relationships',
        'Missing endpoint: indicators/index.json',
        'Missing endpoint: tools/index.json',
        'Missing endpoint: dimensions/index.json',
        'Missing endpoint: relationships/graph.json',
        'Missing endpoint: health.json',
        'Missing endpoint: status.json',
        'No HATEOAS links found',
        'Missing @context in root endpoint',
        'Missing OpenAPI fields: paths',
        'Unexpected OpenAPI version: 2.0',
        'No indicators found',
        'No tools found',
        'No dimensions found'
      ]);
      expect(report.warnings).toEqual(['No _links in index.json']);
    });

    test('should report documents that are not valid JSON', async () => {
      await renderApi(config);
      await fs.writeFile(join(config.apiDir, 'tools/index.json'), '{', 'utf-8');

      const report = await validateDeployment(config.apiDir, BASE);

      expect(report.errors).toEqual([expect.stringMatching(/^Invalid JSON in tools\/index\.json: /)]);
    });

    test('should fail at once when the directory does not exist', async () => {
      const missing = join(tempDir, 'nowhere');

      expect(await validateDeployment(missing, BASE)).toEqual({
        valid: false,
        errors: [`Missing API directory: ${missing}`],
        warnings: [],
        passed: []
      });
    });
  });

  describe('ApiWriter', () => {
    test('should refuse paths outside the root', async () => {
      await expect(writer.writeText('../escape.txt', 'x')).rejects.toThrow(
        'Refusing to write outside the API directory: ../escape.txt'
      );
    });

    test('should record written files relative to the root', async () => {
      await writer.writeJson('tools/by-ring/adopt.json', []);

      expect(writer.getWrittenFiles()).toEqual(['tools/by-ring/adopt.json']);
    });
  });

  describe('Health documents', () => {
    beforeEach(async () => {
      await writer.writeJson('indicators/index.json', {});
      await writer.writeJson('indicators/license.json', {});
      await writer.writeJson('indicators/citation.json', {});
      await writer.writeJson('indicators/by-tool/howfairis.json', {});
      await writer.writeJson('tools/index_p2.json', {});
      await writer.writeJson('tools/howfairis.json', {});
      await writer.writeJson('openapi.json', {});
    });

    test('should count entity documents only', async () => {
      expect(await collectApiStats(tempDir)).toEqual({
        indicators: 2,
        tools: 1,
        dimensions: 0,
        hasOpenApi: true,
        hasRelationships: false
      });
    });

    test('should write health and status with the run id', async () => {
      const config = TestHelpers.config(tempDir);
      await writeHealthDocuments(config, writer, 'run-1', () => new Date('2026-01-01T00:00:00.000Z'));

      const health = await TestHelpers.readJson(join(tempDir, 'health.json'));
      expect(health).toMatchObject({
        '@type': 'HealthCheck',
        status: 'degraded',
        runId: 'run-1',
        timestamp: '2026-01-01T00:00:00.000Z',
        components: {
          data: { status: 'degraded', indicators: 2, tools: 1, dimensions: 0 },
          relationships: { status: 'empty', available: false }
        },
        metrics: { total_endpoints: 6 }
      });

      const status = await TestHelpers.readJson(join(tempDir, 'status.json'));
      expect(status).toMatchObject({ '@type': 'Status', runId: 'run-1', version: 'v1' });
    });
  });
});
