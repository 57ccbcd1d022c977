/**
 * Minimal XML element tree
 *
 * Builds a small in-memory tree with the sax parser in strict mode. Guide
 * checks need random access to children (findall-style lookups), which the
 * streaming callbacks alone don't give.
 */

import sax, { type QualifiedAttribute } from 'sax';

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Concatenated direct text and CDATA content */
  text: string;
}

export type XmlParseResult =
  | { success: true; root: XmlElement }
  | { success: false; error: string };

/**
 * Parse a complete XML document. Any well-formedness error aborts the parse.
 */
export function parseXmlDocument(content: string): XmlParseResult {
  const parser = sax.parser(true, { trim: false, normalize: false });
  const stack: XmlElement[] = [];
  const roots: XmlElement[] = [];

  parser.onerror = (err) => {
    throw err;
  };

  parser.onopentag = (node) => {
    const raw: Record<string, string | QualifiedAttribute> = node.attributes;
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
      attributes[key] = typeof value === 'string' ? value : value.value;
    }

    const element: XmlElement = { name: node.name, attributes, children: [], text: '' };
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else if (roots.length > 0) {
      throw new Error('Multiple root elements');
    } else {
      roots.push(element);
    }
    stack.push(element);
  };

  parser.onclosetag = () => {
    stack.pop();
  };

  const appendText = (text: string) => {
    const current = stack[stack.length - 1];
    if (current) current.text += text;
  };
  parser.ontext = appendText;
  parser.oncdata = appendText;

  try {
    parser.write(content).close();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: message.replace(/\s*\n\s*/g, ', ') };
  }

  const root = roots[0];
  if (!root) {
    return { success: false, error: 'Document has no root element' };
  }
  return { success: true, root };
}

/**
 * Direct children with the given name, in document order
 */
export function findChildren(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter((child) => child.name === name);
}

/**
 * First direct child with the given name
 */
export function findChild(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find((child) => child.name === name);
}
