import { gunzipSync } from 'zlib';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { RemoteComponent } from '../../types/bundle.types.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('AppStream');

/**
 * Element text, either bare or with attributes
 */
const textNode = z.union([
  z.string(),
  z.object({
    '#text': z.string().optional(),
    '@_xml:lang': z.string().optional(),
    '@_type': z.string().optional(),
  }),
]);

type TextNode = z.infer<typeof textNode>;

const componentNode = z.object({
  id: z.array(textNode).min(1),
  name: z.array(textNode).default([]),
  summary: z.array(textNode).default([]),
  extends: z.array(textNode).default([]),
  languages: z.array(z.union([z.string(), z.object({ lang: z.array(textNode).default([]) })])).default([]),
  bundle: z.array(textNode).default([]),
  size: z.array(textNode).default([]),
});

const catalogDocument = z.object({
  components: z.object({
    component: z.array(z.unknown()).default([]),
  }),
});

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // Every element below the root is a list, so single and repeated children read the same
  isArray: (_tagName, jPath, _isLeafNode, isAttribute) => !isAttribute && jPath !== 'components',
});

function textOf(node: TextNode): string {
  return (typeof node === 'string' ? node : node['#text'] ?? '').trim();
}

function attrsOf(node: TextNode): { lang?: string; type?: string } {
  if (typeof node === 'string') return {};
  return { lang: node['@_xml:lang'], type: node['@_type'] };
}

/**
 * The untranslated variant of a localisable element
 */
function untranslated(nodes: TextNode[]): string | undefined {
  const plain = nodes.find(node => !attrsOf(node).lang) ?? nodes[0];
  return plain === undefined ? undefined : textOf(plain);
}

/**
 * App id from a flatpak bundle ref such as "app/org.example.App/x86_64/stable"
 */
export function bundleId(ref: string): string {
  const parts = ref.split('/');
  return parts.length === 4 && parts[1] ? parts[1] : ref;
}

function toComponent(node: z.infer<typeof componentNode>): RemoteComponent | null {
  const [idNode] = node.id;
  const id = idNode === undefined ? '' : textOf(idNode);
  if (!id) return null;

  const languages: string[] = [];
  for (const group of node.languages) {
    if (typeof group === 'string') continue;
    for (const lang of group.lang) {
      const tag = textOf(lang);
      if (tag) languages.push(tag);
    }
  }

  const flatpakBundle = node.bundle.find(b => attrsOf(b).type === 'flatpak');
  const downloadSize = node.size
    .filter(s => attrsOf(s).type === 'download')
    .map(s => Number(textOf(s)))
    .find(n => Number.isFinite(n) && n >= 0);

  return {
    id,
    bundle: flatpakBundle ? bundleId(textOf(flatpakBundle)) : undefined,
    name: untranslated(node.name) ?? id,
    summary: untranslated(node.summary),
    languages,
    extends: node.extends.map(textOf).filter(e => e.length > 0),
    downloadSize,
  };
}

/**
 * Parse an AppStream catalog document into components.
 * Individual malformed components are skipped; a document without a
 * `<components>` root is an error.
 */
export function parseAppStreamCatalog(xml: string): RemoteComponent[] {
  const document = catalogDocument.safeParse(parser.parse(xml));
  if (!document.success) {
    throw new Error('Not an AppStream catalog: missing <components> root');
  }

  const components: RemoteComponent[] = [];
  for (const raw of document.data.components.component) {
    const parsed = componentNode.safeParse(raw);
    if (!parsed.success) {
      logger.debug('Skipping malformed component:', parsed.error.errors[0]?.message);
      continue;
    }
    const component = toComponent(parsed.data);
    if (component) components.push(component);
  }

  return components;
}

/**
 * Parse a gzip-compressed catalog (appstream.xml.gz)
 */
export function parseCompressedCatalog(data: Buffer): RemoteComponent[] {
  return parseAppStreamCatalog(gunzipSync(data).toString('utf8'));
}
