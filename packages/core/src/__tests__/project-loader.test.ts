import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { TemplateSyntaxError } from '../errors.js';
import { LineagePipeline } from '../lineage/pipeline.js';
import { createProject } from '../lineage/project.js';
import { extractMacros, loadProjectFiles } from '../lineage/project-loader.js';

const MACROS =
  '{% macro cents(col, scale=100) %}({{ col }} / {{ scale }}){% endmacro %}\n' +
  '{% macro star() %}*{% endmacro %}\n';

const REPORT_SQL = "select {{ cents('amount') }} as amount from {{ ref('stg_orders') }}";

describe('loadProjectFiles', () => {
  let root: string;

  async function write(path: string, content: string): Promise<void> {
    const file = join(root, path);
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, content, 'utf8');
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'lineage-project-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should read models recursively in path order and skip other files', async () => {
    await write('models/staging/stg_orders.sql', 'select id, amount from raw.orders');
    await write('models/report.sql', REPORT_SQL);
    await write('models/README.md', '# models');
    await write('macros/money.sql', MACROS);

    const files = await loadProjectFiles(root);

    expect(files.models).toEqual([
      {
        name: 'report',
        rawSql: REPORT_SQL,
        path: 'models/report.sql',
      },
      {
        name: 'stg_orders',
        rawSql: 'select id, amount from raw.orders',
        path: 'models/staging/stg_orders.sql',
      },
    ]);
    expect(files.macros.map((macro) => macro.name)).toEqual(['cents', 'star']);
  });

  it('should produce input the pipeline can analyze', async () => {
    await write('models/staging/stg_orders.sql', 'select 1 as id, 2 as amount');
    await write('models/report.sql', REPORT_SQL);
    await write('macros/money.sql', MACROS);

    const project = createProject(await loadProjectFiles(root));
    const report = await new LineagePipeline().analyze(project);

    expect(report.order).toEqual(['stg_orders', 'report']);
    expect(report.lineage.get('report')?.columns).toEqual([
      {
        name: 'amount',
        provenance: [{ kind: 'column', producer: 'stg_orders', column: 'amount' }],
      },
    ]);
    expect(report.hasErrors).toBe(false);
  });

  it('should honour custom directories and macro namespaces', async () => {
    await write('transform/orders.sql', 'select 1');
    await write('lib/money.sql', MACROS);

    const files = await loadProjectFiles(root, {
      modelPaths: ['transform'],
      macroPaths: ['lib'],
      macroPackage: 'money',
    });

    expect(files.models.map((model) => model.path)).toEqual(['transform/orders.sql']);
    expect(files.macros.map((macro) => macro.package)).toEqual(['money', 'money']);
  });

  it('should return nothing for missing directories', async () => {
    expect(await loadProjectFiles(root)).toEqual({ models: [], macros: [] });
  });

  it('should reject two model files with the same name', async () => {
    await write('models/a/orders.sql', 'select 1');
    await write('models/b/orders.sql', 'select 2');

    await expect(loadProjectFiles(root)).rejects.toThrow(
      "Duplicate model name 'orders' in models/a/orders.sql and models/b/orders.sql"
    );
  });
});

describe('extractMacros', () => {
  it('should read parameters, literal defaults and body text', () => {
    expect(extractMacros(MACROS, 'macros/money.sql', 'utils')).toEqual([
      {
        name: 'cents',
        package: 'utils',
        parameters: [{ name: 'col' }, { name: 'scale', default: 100 }],
        body: '({{ col }} / {{ scale }})',
      },
      { name: 'star', package: 'utils', parameters: [], body: '*' },
    ]);
  });

  it('should reject parameter defaults that are not literals', () => {
    const extract = () => extractMacros('{% macro m(a=b) %}{% endmacro %}', 'macros/m.sql');

    expect(extract).toThrow(TemplateSyntaxError);
    expect(extract).toThrow(
      "Template syntax error in 'macros/m.sql' at offset 0: " +
        "default of parameter 'a' in macro 'm' must be a literal"
    );
  });
});
