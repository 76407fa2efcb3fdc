import { ParserRegistry } from '../registry.js';
import { XmlChangelogParserPlugin } from './xml/index.js';

export function createDefaultRegistry(): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register(new XmlChangelogParserPlugin());
  return registry;
}
