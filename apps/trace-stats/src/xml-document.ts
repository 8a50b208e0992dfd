import { readFile } from 'node:fs/promises'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { TraceStatsError, toTraceStatsError } from '@trace-stats/pipeline-common'

/**
 * Expanded element name: namespace URI plus local part.
 */
export interface XmlName {
  namespace: string
  localName: string
}

export interface XmlText {
  kind: 'text'
  value: string
}

export interface XmlElement {
  kind: 'element'
  name: XmlName
  /** Tag as written in the source, prefix included. */
  qualifiedName: string
  /** Attributes keyed by their name as written (`name`, `xmlns:x`). */
  attributes: ReadonlyMap<string, string>
  nodes: readonly XmlNode[]
}

export type XmlNode = XmlElement | XmlText

export interface XmlDocument {
  root: XmlElement
  /** In-scope default namespace of the root element, `''` when none is declared. */
  defaultNamespace: string
}

const ATTRIBUTE_PREFIX = '@_'
const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'
const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace'

type NamespaceScope = ReadonlyMap<string, string>

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  // decodes numeric character references such as `&#xD;`
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
})

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const toText = (value: unknown): string => {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return ''
}

const splitQualifiedName = (qualifiedName: string): { prefix: string; localName: string } => {
  const separator = qualifiedName.indexOf(':')
  if (separator === -1) {
    return { prefix: '', localName: qualifiedName }
  }
  return {
    prefix: qualifiedName.slice(0, separator),
    localName: qualifiedName.slice(separator + 1),
  }
}

const readAttributes = (raw: unknown): Map<string, string> => {
  const attributes = new Map<string, string>()
  if (!isRecord(raw)) {
    return attributes
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key
    attributes.set(name, toText(value))
  }
  return attributes
}

const extendScope = (scope: NamespaceScope, attributes: ReadonlyMap<string, string>): NamespaceScope => {
  const declarations = [...attributes].filter(
    ([name]) => name === 'xmlns' || name.startsWith('xmlns:')
  )
  if (declarations.length === 0) {
    return scope
  }

  const extended = new Map(scope)
  for (const [name, value] of declarations) {
    extended.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), value)
  }
  return extended
}

const resolveName = (qualifiedName: string, scope: NamespaceScope): XmlName => {
  const { prefix, localName } = splitQualifiedName(qualifiedName)
  const namespace = scope.get(prefix)
  if (namespace === undefined) {
    if (prefix === '') {
      return { namespace: '', localName }
    }
    throw new TraceStatsError('format', `Unbound namespace prefix "${prefix}" on element <${qualifiedName}>`)
  }
  return { namespace, localName }
}

const elementTag = (node: Record<string, unknown>): string | undefined => {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY)
}

const convertNodes = (raw: unknown, scope: NamespaceScope): XmlNode[] => {
  if (!Array.isArray(raw)) {
    return []
  }

  const nodes: XmlNode[] = []
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue
    }

    if (TEXT_KEY in entry) {
      nodes.push({ kind: 'text', value: toText(entry[TEXT_KEY]) })
      continue
    }

    const tag = elementTag(entry)
    if (tag === undefined) {
      continue
    }

    const attributes = readAttributes(entry[ATTRIBUTES_KEY])
    const elementScope = extendScope(scope, attributes)
    nodes.push({
      kind: 'element',
      name: resolveName(tag, elementScope),
      qualifiedName: tag,
      attributes,
      nodes: convertNodes(entry[tag], elementScope),
    })
  }
  return nodes
}

/**
 * Parses XML text into a namespace-resolved document tree.
 * @throws TraceStatsError(`format`) when the text is not well-formed or has no root element.
 */
export const parseTraceDocument = (xml: string): XmlDocument => {
  const source = xml.startsWith('\uFEFF') ? xml.slice(1) : xml

  const validation = XMLValidator.validate(source)
  if (validation !== true) {
    const { msg, line, col } = validation.err
    throw new TraceStatsError('format', `Malformed XML at line ${line}, column ${col}: ${msg}`)
  }

  const initialScope: NamespaceScope = new Map([['xml', XML_NAMESPACE]])
  const nodes = convertNodes(parser.parse(source), initialScope)
  const root = nodes.find((node): node is XmlElement => node.kind === 'element')
  if (!root) {
    throw new TraceStatsError('format', 'XML document has no root element')
  }

  const rootScope = extendScope(initialScope, root.attributes)
  return { root, defaultNamespace: rootScope.get('') ?? '' }
}

const detectEncoding = (bytes: Uint8Array): 'utf-8' | 'utf-16le' | 'utf-16be' => {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return 'utf-16le'
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return 'utf-16be'
  }
  return 'utf-8'
}

/**
 * Decodes trace bytes: UTF-16 when a byte-order mark says so, strict UTF-8 otherwise.
 * @throws TraceStatsError(`format`) when the bytes are not valid in the detected encoding.
 */
export const decodeTraceBytes = (bytes: Uint8Array): string => {
  const encoding = detectEncoding(bytes)
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes)
  } catch (error) {
    throw new TraceStatsError('format', `Trace file is not valid ${encoding.toUpperCase()}`, {
      cause: error,
    })
  }
}

/**
 * Reads and parses the trace file at `filePath`. The whole document is held in memory.
 */
export const loadTraceDocument = async (filePath: string): Promise<XmlDocument> => {
  let bytes: Buffer
  try {
    bytes = await readFile(filePath)
  } catch (error) {
    throw toTraceStatsError(error, `Cannot read trace file ${filePath}`)
  }
  return parseTraceDocument(decodeTraceBytes(bytes))
}

/**
 * Direct element children of `element`, optionally restricted to one expanded name.
 */
export const childElements = (element: XmlElement, name?: XmlName): XmlElement[] => {
  return element.nodes.filter(
    (node): node is XmlElement =>
      node.kind === 'element' &&
      (name === undefined ||
        (node.name.namespace === name.namespace && node.name.localName === name.localName))
  )
}

/**
 * Concatenated text of every descendant text node, in document order.
 */
export const textContent = (node: XmlNode): string => {
  if (node.kind === 'text') {
    return node.value
  }
  return node.nodes.map(textContent).join('')
}

/**
 * Value of an attribute without a namespace prefix, or undefined when absent.
 */
export const getAttribute = (element: XmlElement, name: string): string | undefined => {
  return element.attributes.get(name)
}
