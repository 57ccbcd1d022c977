/**
 * EPG Module
 *
 * XMLTV guide parsing and validation
 */

export {
  checkGuide,
  type GuideChannel,
  type GuideProgram,
  type GuideCheckResult,
} from './guide-checker';

export { parseXmltvDate } from './xmltv-date';

export { parseXmlDocument, findChild, findChildren, type XmlElement, type XmlParseResult } from './xml-tree';
