import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import type { Model } from '@lineagekit/types';

import { ConfigurationError, MacroRecursionError, UnresolvedReferenceError } from '../errors.js';
import { createProject } from '../lineage/project.js';
import { TemplateRenderer } from '../templating/renderer.js';

const project = createProject({
  models: [
    { name: 'orders', rawSql: 'select 1 as id', path: 'models/orders.sql' },
    { name: 'customers', rawSql: 'select 1 as id', path: 'models/customers.sql' },
  ],
  sources: [{ sourceName: 'shop', name: 'raw_orders' }],
  macros: [
    {
      name: 'cents',
      parameters: [{ name: 'col' }, { name: 'scale', default: 100 }],
      body: '({{ col }} / {{ scale }})',
    },
    { name: 'star', package: 'utils', body: '*' },
    { name: 'loop', body: '{{ loop() }}' },
    { name: 'outer', parameters: [{ name: 'col' }], body: 'sum{{ cents(col) }}' },
  ],
  vars: { region: 'eu' },
});

function model(rawSql: string, name = 'report'): Model {
  return { name, rawSql, path: `models/${name}.sql` };
}

describe('TemplateRenderer', () => {
  const renderer = new TemplateRenderer(project);

  it('should render text without directives unchanged', () => {
    fc.assert(
      fc.property(
        fc.string().filter((text) => !text.includes('{')),
        (text) => renderer.render(model(text)).sql === text
      )
    );
  });

  it('should expand references, sources, vars and macros', () => {
    const result = renderer.render(
      model(
        "select {{ cents('amount') }} as amount from {{ ref('orders') }} " +
          "join {{ source('shop', 'raw_orders') }} using (id) where region = '{{ var('region') }}'"
      )
    );

    expect(result.sql).toBe(
      'select (amount / 100) as amount from main.orders ' +
        "join shop.raw_orders using (id) where region = 'eu'"
    );
    expect(result.references).toEqual([
      { kind: 'model', target: 'orders', relation: 'main.orders' },
      { kind: 'source', target: 'shop.raw_orders', relation: 'shop.raw_orders' },
    ]);
    expect(result.macros).toEqual(['cents']);
  });

  it('should collapse duplicate references in first-use order', () => {
    const result = renderer.render(
      model(
        "select * from {{ ref('customers') }} c join {{ ref('orders') }} o " +
          "on {{ ref('customers') }}.id = o.id"
      )
    );

    expect(result.references.map((reference) => reference.target)).toEqual(['customers', 'orders']);
  });

  it('should accept the package-qualified form of ref', () => {
    const result = renderer.render(model("select * from {{ ref('analytics', 'orders') }}"));

    expect(result.sql).toBe('select * from main.orders');
  });

  it('should bind keyword arguments and parameter defaults', () => {
    expect(renderer.render(model("{{ cents('amount', scale=1000) }}")).sql).toBe('(amount / 1000)');
    expect(renderer.render(model("{{ cents(col='fee') }}")).sql).toBe('(fee / 100)');
  });

  it('should expand nested and namespaced macros', () => {
    const result = renderer.render(model("select {{ utils.star() }}, {{ outer('x') }} from t"));

    expect(result.sql).toBe('select *, sum(x / 100) from t');
    expect(result.macros).toEqual(['utils.star', 'outer', 'cents']);
  });

  it('should expand macros defined in the model itself', () => {
    const result = renderer.render(model('{% macro two() %}2{% endmacro %}select {{ two() }}'));

    expect(result.sql).toBe('select 2');
  });

  it('should evaluate set, conditionals and concatenation', () => {
    const text =
      "{% set suffix = '_v2' %}select '{{ 'orders' ~ suffix }}'" +
      "{% if var('region') == 'us' %} A{% elif var('region') == 'eu' %} B{% else %} C{% endif %}";

    expect(renderer.render(model(text)).sql).toBe("select 'orders_v2' B");
  });

  it('should render configuration helpers without side effects', () => {
    const text =
      "{{ config(materialized='table') }}select * from {{ this }}" +
      '{% if is_incremental() %} where x > 0{% endif %} -- ' +
      "{{ env_var('HOME', 'none') }} {{ var('missing', 1) }}";

    expect(renderer.render(model(text)).sql).toBe('select * from main.report -- none 1');
  });

  describe('errors', () => {
    it('should fail a model that references an unknown model', () => {
      const customers = model('select * from {{ ref("raw_customers") }}', 'customers');
      const render = () => renderer.render(customers);

      expect(render).toThrow(UnresolvedReferenceError);
      expect(render).toThrow(
        "Model 'customers' references model 'raw_customers' which does not exist in the project"
      );
    });

    it('should name the missing source, var and macro', () => {
      const cases: [string, string, string][] = [
        ["{{ source('shop', 'missing') }}", 'shop.missing', 'source'],
        ["{{ var('nope') }}", 'nope', 'var'],
        ['{{ nothing() }}', 'nothing', 'macro'],
      ];

      for (const [text, target, targetKind] of cases) {
        try {
          renderer.render(model(text));
          expect.unreachable();
        } catch (error) {
          expect(error).toBeInstanceOf(UnresolvedReferenceError);
          if (error instanceof UnresolvedReferenceError) {
            expect(error.target).toBe(target);
            expect(error.targetKind).toBe(targetKind);
          }
        }
      }
    });

    it('should stop recursive macro expansion at the depth limit', () => {
      const bounded = new TemplateRenderer(project, { macroDepthLimit: 3 });

      try {
        bounded.render(model('{{ loop() }}', 'm'));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MacroRecursionError);
        if (error instanceof MacroRecursionError) {
          expect(error.chain).toEqual(['m', 'loop', 'loop', 'loop', 'loop']);
          expect(error.message).toBe(
            "Macro expansion in 'm' exceeded depth 3: m -> loop -> loop -> loop -> loop"
          );
        }
      }
    });

    it('should reject a depth limit that is not a positive integer', () => {
      const withLimit = (macroDepthLimit: number) => () =>
        new TemplateRenderer(project, { macroDepthLimit });
      expect(withLimit(0)).toThrow(ConfigurationError);
      expect(withLimit(Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
    });
  });
});
