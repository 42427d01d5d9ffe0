import Table from 'cli-table3';

export function printTable(
  data: Record<string, unknown>[],
  options: Table.TableConstructorOptions & { head: string[] },
) {
  const table = new Table(options);
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}
