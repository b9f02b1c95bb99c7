import { parseArgs } from 'node:util';
import type { CollectionInfo } from '../../storage/types.js';
import { withLocalPagecite, type CommandContext } from '../session.js';

export interface CollectionsCommandOptions {
  context: CommandContext;
  args: string[];
}

function describeLine(info: CollectionInfo): string {
  const marker = info.hasDocstore ? '✓' : '✗';
  return `  ${marker} ${info.name} (${info.nodeCount} chunks, ${info.leafCount} searchable)`;
}

export async function collectionsCommand(options: CollectionsCommandOptions): Promise<void> {
  const { values } = parseArgs({
    args: options.args,
    options: {
      config: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: false,
    strict: true,
  });

  const infos = await withLocalPagecite(options.context, values.config, async ({ store }) => {
    const names = await store.listCollections();
    return names.flatMap((name) => {
      const info = store.describeCollection(name);
      return info ? [info] : [];
    });
  });

  if (values.json) {
    console.log(JSON.stringify({
      collections: infos.map((info) => ({ ...info, createdAt: info.createdAt.toISOString() })),
    }, null, 2));
    return;
  }

  if (infos.length === 0) {
    console.log('No collections yet. Run `pagecite ingest <pages.json>` to add one.');
    return;
  }

  console.log(`Collections (${infos.length}):`);
  for (const info of infos) {
    console.log(describeLine(info));
  }
}
