import type { ChangelogParserPlugin } from './plugin.js';
import { getExtension } from '../utils/path.js';

export class ParserRegistry {
  private plugins = new Map<string, ChangelogParserPlugin>();
  private extensionMap = new Map<string, string>(); // ext → plugin id

  register(plugin: ChangelogParserPlugin): void {
    this.plugins.set(plugin.id, plugin);
    for (const ext of plugin.extensions) {
      this.extensionMap.set(ext, plugin.id);
    }
  }

  getPlugin(filePath: string): ChangelogParserPlugin | undefined {
    const pluginId = this.extensionMap.get(getExtension(filePath));
    return pluginId ? this.plugins.get(pluginId) : undefined;
  }

  supportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }
}
