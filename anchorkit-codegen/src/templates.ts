/**
 * Handlebars templates of the generated client, compiled once on first use
 */

import Handlebars from 'handlebars';
import { readFileSync } from 'fs';
import { join } from 'path';

import { quote } from './typeMapping';

const TEMPLATES_DIR = join(__dirname, '..', 'templates');

export const TEMPLATE_NAMES = [
  'programId',
  'struct',
  'enum',
  'typesIndex',
  'account',
  'accountsIndex',
  'instruction',
  'instructionsIndex',
  'errors',
  'index',
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

type Template = (context: object) => string;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function createEngine(): typeof Handlebars {
  const engine = Handlebars.create();

  // {{quote value}} -> 'value'
  engine.registerHelper('quote', (value: unknown) => quote(String(value)));

  // {{jsdoc docs '  '}} -> indented doc comment followed by a newline, or nothing
  engine.registerHelper('jsdoc', (docs: unknown, indent: unknown) => {
    if (!isStringArray(docs) || docs.length === 0) return '';
    const pad = typeof indent === 'string' ? indent : '';
    const lines = docs.map((line) => `${pad} * ${line.replace(/\*\//g, '*\\/')}`.trimEnd());
    return `${pad}/**\n${lines.join('\n')}\n${pad} */\n`;
  });

  return engine;
}

let compiled: Map<TemplateName, Template> | null = null;

function loadTemplates(): Map<TemplateName, Template> {
  const engine = createEngine();
  const templates = new Map<TemplateName, Template>();
  for (const name of TEMPLATE_NAMES) {
    const source = readFileSync(join(TEMPLATES_DIR, `${name}.hbs`), 'utf8');
    templates.set(name, engine.compile(source, { noEscape: true }));
  }
  return templates;
}

/**
 * Render a template against its context
 */
export function render(name: TemplateName, context: object): string {
  if (!compiled) {
    compiled = loadTemplates();
  }
  const template = compiled.get(name);
  if (!template) {
    throw new Error(`Template ${name} not found`);
  }
  return template(context);
}
