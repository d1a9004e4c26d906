import { XMLParser, XMLBuilder } from 'fast-xml-parser';

// Parser options that preserve structure and attributes
const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  preserveOrder: true,
  commentPropName: '#comment',
  cdataPropName: '#cdata',
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  // decodes numeric character references such as &#160;
  htmlEntities: true,
};

// Builder options matching parser for round-trip compatibility
const builderOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  preserveOrder: true,
  commentPropName: '#comment',
  cdataPropName: '#cdata',
  format: false,
  suppressEmptyNode: false,
  suppressBooleanAttributes: false,
};

const parser = new XMLParser(parserOptions);
const builder = new XMLBuilder(builderOptions);

/**
 * XML node type from fast-xml-parser with preserveOrder
 * Each node is an object with a single key (the tag name)
 * containing an array of child nodes, plus optional :@
 * for attributes
 */
export interface XmlNode {
  [tagName: string]: XmlNode[] | string | Record<string, string> | undefined;
}

/**
 * Parses an XML string into an ordered node list.
 * The XML declaration, if any, is kept as a `?xml` node.
 */
export const parseXml = (xml: string): XmlNode[] => {
  return parser.parse(xml);
};

/**
 * Converts an ordered node list back to an XML string
 */
export const stringifyXml = (nodes: XmlNode[]): string => {
  return builder.build(nodes);
};

/**
 * Returns the tag name of an element node, or undefined for text,
 * comment and attribute-only entries
 */
export const tagNameOf = (node: XmlNode): string | undefined => {
  for (const key of Object.keys(node)) {
    if (key !== ':@' && key !== '#text' && key !== '#comment' && key !== '#cdata') {
      return key;
    }
  }
  return undefined;
};

/**
 * Finds the first element with the given tag name (immediate children only)
 */
export const findElement = (nodes: XmlNode[], tagName: string): XmlNode | undefined => {
  return nodes.find((node) => tagName in node);
};

/**
 * Finds all elements with the given tag name (immediate children only)
 */
export const findElements = (nodes: XmlNode[], tagName: string): XmlNode[] => {
  return nodes.filter((node) => tagName in node);
};

/**
 * Gets the live children array of an element.
 * Mutating the returned array mutates the tree.
 */
export const getChildren = (node: XmlNode, tagName: string): XmlNode[] => {
  const children = node[tagName];
  if (Array.isArray(children)) {
    return children;
  }
  return [];
};

/**
 * Gets an attribute value from a node
 */
export const getAttr = (node: XmlNode, name: string): string | undefined => {
  const attrs = node[':@'];
  if (attrs && !Array.isArray(attrs) && typeof attrs === 'object') {
    return attrs[`@_${name}`];
  }
  return undefined;
};

/**
 * Concatenates the text and CDATA content directly under an element
 */
export const getText = (node: XmlNode, tagName: string): string => {
  let text = '';
  for (const child of getChildren(node, tagName)) {
    const value = child['#text'];
    if (typeof value === 'string') {
      text += value;
    } else if ('#cdata' in child) {
      text += getText(child, '#cdata');
    }
  }
  return text;
};

/**
 * Creates a new XML element
 */
export const createElement = (tagName: string, attrs?: Record<string, string>, children?: XmlNode[]): XmlNode => {
  const node: XmlNode = {
    [tagName]: children || [],
  };
  if (attrs && Object.keys(attrs).length > 0) {
    const attrObj: Record<string, string> = {};
    for (const [key, value] of Object.entries(attrs)) {
      attrObj[`@_${key}`] = value;
    }
    node[':@'] = attrObj;
  }
  return node;
};

/**
 * Creates a text node
 */
export const createText = (text: string): XmlNode => {
  return { '#text': text };
};

/**
 * Adds XML declaration to the start of an XML string
 */
export const addXmlDeclaration = (xml: string): string => {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n${xml}`;
};

/**
 * Deep clones an XML node
 */
export const cloneNode = (node: XmlNode): XmlNode => {
  return JSON.parse(JSON.stringify(node));
};

/**
 * Deep clones an array of XML nodes
 */
export const cloneNodes = (nodes: XmlNode[]): XmlNode[] => {
  return JSON.parse(JSON.stringify(nodes));
};
