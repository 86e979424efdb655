import { DEFAULT_CSV_PATH, parseCliOptionMap } from './lib/cli.js';
import { renderCollectionPlan } from './lib/collection_plan.js';
import { resolveFromCwd } from './lib/io.js';
import { readPermissionMatrix } from './lib/permission_matrix.js';

async function main(): Promise<void> {
  const options = parseCliOptionMap(process.argv.slice(2), new Set<string>());
  for (const key of options.keys()) {
    if (key !== 'csv' && key !== 'path-column') {
      throw new Error(`Unknown option '--${key}'. Expected --csv, --path-column`);
    }
  }

  const matrix = await readPermissionMatrix(resolveFromCwd(options.get('csv') ?? DEFAULT_CSV_PATH), {
    pathColumn: options.get('path-column')
  });

  const organizationId = process.env.BW_ORGID?.trim() || undefined;
  const command = process.env.BW_CLI?.trim() || undefined;
  process.stdout.write(renderCollectionPlan(matrix.paths, organizationId, command));
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
