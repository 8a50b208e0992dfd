import { TraceStatsError } from '@trace-stats/pipeline-common'
import { childElements, getAttribute, textContent } from './xml-document'
import type { XmlDocument, XmlElement, XmlName } from './xml-document'

const inNamespace = (namespace: string, localName: string): XmlName => ({ namespace, localName })

/**
 * Direct `Column` children of an event element.
 */
export const columnsOf = (element: XmlElement, namespace: string): XmlElement[] => {
  return childElements(element, inNamespace(namespace, 'Column'))
}

/**
 * Returns the candidate event elements: the direct children of the root's first
 * `Events` element, whatever their tag, in document order.
 * @throws TraceStatsError(`format`) when the root has no `Events` child.
 */
export const extractCandidates = (document: XmlDocument): XmlElement[] => {
  const [events] = childElements(document.root, inNamespace(document.defaultNamespace, 'Events'))
  if (!events) {
    throw new TraceStatsError(
      'format',
      `No <Events> element found under <${document.root.qualifiedName}>`
    )
  }
  return childElements(events)
}

/**
 * A candidate is relevant when exactly one of its columns is named
 * `ApplicationName` and that column's text equals `applicationName`.
 */
export const isRelevantEvent = (
  element: XmlElement,
  namespace: string,
  applicationName: string
): boolean => {
  const appNameColumns = columnsOf(element, namespace).filter(
    (column) => getAttribute(column, 'name') === 'ApplicationName'
  )

  return appNameColumns.length === 1 && textContent(appNameColumns[0]) === applicationName
}
