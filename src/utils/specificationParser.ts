/**
 * Extraction of result objects from a Web Intelligence query specification.
 *
 * The specification endpoint answers with XML shaped like
 *
 *   <queryspec:QuerySpec ...>
 *     <queryTree>
 *       <children>
 *         <query>
 *           <resultObjects identifier="DP0.DO1" name="Revenue"/>
 *           ...
 *
 * Combined queries repeat `children` and `query`; all of them are read in
 * document order.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "../services/biprws/errors.js";

export interface ResultObject {
  name: string;
  identifier?: string;
}

type XmlNode = Record<string, unknown>;

const REPEATED_ELEMENTS = new Set(["children", "query", "resultObjects"]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) =>
    !isAttribute && REPEATED_ELEMENTS.has(tagName),
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childNodes(node: XmlNode, key: string): XmlNode[] {
  const value = node[key];
  if (Array.isArray(value)) {
    return value.filter(isNode);
  }
  return isNode(value) ? [value] : [];
}

function findQueryTree(document: XmlNode): XmlNode | undefined {
  if (isNode(document.queryTree)) {
    return document.queryTree;
  }
  for (const value of Object.values(document)) {
    if (isNode(value) && isNode(value.queryTree)) {
      return value.queryTree;
    }
  }
  return undefined;
}

function toResultObject(node: XmlNode): ResultObject | undefined {
  const { name, identifier } = node;
  if (typeof name !== "string") {
    return undefined;
  }
  return typeof identifier === "string" ? { name, identifier } : { name };
}

/**
 * Parse a query specification and return its result objects in order.
 *
 * @throws ParseError when the XML is malformed or has no query tree
 */
export function parseResultObjects(xml: string): ResultObject[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ParseError(
      `Query specification is not well-formed XML: ${validation.err.msg} (line ${validation.err.line})`,
    );
  }

  const parsed: unknown = xmlParser.parse(xml);
  const queryTree = isNode(parsed) ? findQueryTree(parsed) : undefined;
  if (!queryTree) {
    throw new ParseError("Query specification has no queryTree element");
  }

  const resultObjects: ResultObject[] = [];
  for (const children of childNodes(queryTree, "children")) {
    for (const query of childNodes(children, "query")) {
      for (const node of childNodes(query, "resultObjects")) {
        const resultObject = toResultObject(node);
        if (resultObject) {
          resultObjects.push(resultObject);
        }
      }
    }
  }
  return resultObjects;
}

/**
 * All result objects whose name equals `objectName` exactly (case-sensitive).
 */
export function findResultObjects(
  resultObjects: ResultObject[],
  objectName: string,
): ResultObject[] {
  return resultObjects.filter((resultObject) => resultObject.name === objectName);
}
