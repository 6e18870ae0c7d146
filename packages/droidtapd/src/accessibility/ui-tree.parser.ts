import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { Bounds, EmptyCaptureError, UIElement, centerOf } from '@droidtap/shared';

type XmlNode = Record<string, unknown>;

const BOUNDS_PATTERN = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;
const ZERO_BOUNDS: Bounds = Object.freeze({ left: 0, top: 0, right: 0, bottom: 0 });

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  isArray: (name) => name === 'node',
});

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function attribute(node: XmlNode, name: string): string {
  const value = node[`@_${name}`];
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

function children(node: XmlNode): XmlNode[] {
  const value = node.node;
  if (Array.isArray(value)) {
    return value.filter(isXmlNode);
  }
  return isXmlNode(value) ? [value] : [];
}

/**
 * Parses `"[left,top][right,bottom]"`. Anything else yields zero bounds.
 */
export function parseBounds(raw: string): Bounds {
  const match = BOUNDS_PATTERN.exec(raw.trim());
  if (!match) {
    return ZERO_BOUNDS;
  }
  return Object.freeze({
    left: parseInt(match[1], 10),
    top: parseInt(match[2], 10),
    right: parseInt(match[3], 10),
    bottom: parseInt(match[4], 10),
  });
}

function toElement(node: XmlNode): UIElement {
  const bounds = parseBounds(attribute(node, 'bounds'));
  return Object.freeze({
    text: attribute(node, 'text'),
    contentDescription: attribute(node, 'content-desc'),
    className: attribute(node, 'class'),
    resourceId: attribute(node, 'resource-id'),
    packageName: attribute(node, 'package'),
    bounds,
    center: Object.freeze(centerOf(bounds)),
    clickable: attribute(node, 'clickable') === 'true',
    scrollable: attribute(node, 'scrollable') === 'true',
  });
}

/**
 * Flattens a uiautomator hierarchy dump into elements in depth-first
 * document order.
 */
export function parseUiTree(xml: string): UIElement[] {
  if (!xml.trim()) {
    throw new EmptyCaptureError('accessibility-tree', 'dump was empty');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new EmptyCaptureError('accessibility-tree', validation.err.msg);
  }

  const parsed: unknown = parser.parse(xml);
  const hierarchy = isXmlNode(parsed) ? parsed.hierarchy : undefined;
  if (!isXmlNode(hierarchy)) {
    throw new EmptyCaptureError('accessibility-tree', 'no hierarchy root');
  }

  const elements: UIElement[] = [];
  const visit = (node: XmlNode) => {
    elements.push(toElement(node));
    children(node).forEach(visit);
  };
  children(hierarchy).forEach(visit);

  if (elements.length === 0) {
    throw new EmptyCaptureError('accessibility-tree', 'hierarchy has no nodes');
  }
  return elements;
}
