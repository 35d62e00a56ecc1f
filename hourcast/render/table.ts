import stringWidth from "string-width";
import { MISSING } from "./formatWeather.js";

type Column = {
  header: string;
  cells: string[];
};

type Group = {
  name: string | null;
  count: number;
};

type GroupLayout = {
  name: string | null;
  first: number;
  count: number;
  /** May exceed the columns' natural width when the group name is wider. */
  span: number;
};

export function ljust(s: string, width: number): string {
  const w = stringWidth(s);
  return w >= width ? s : s + " ".repeat(width - w);
}

export function rjust(s: string, width: number): string {
  const w = stringWidth(s);
  return w >= width ? s : " ".repeat(width - w) + s;
}

/**
 * Aligned text table with optional named column groups.
 *
 *   new Table().column("Date", dates).group("gfs").column("Temp", temps).render()
 *
 * Columns added after `group(name)` belong to that group until the next call.
 */
export class Table {
  private columns: Column[] = [];
  private groups: Group[] = [];
  private openGroupStart = 0;
  private openGroupName: string | null = null;

  column(header: string, cells: string[]): this {
    this.columns.push({ header, cells });
    return this;
  }

  group(name: string): this {
    const count = this.columns.length - this.openGroupStart;
    if (count > 0) {
      this.groups.push({ name: this.openGroupName, count });
    }
    this.openGroupStart = this.columns.length;
    this.openGroupName = name;
    return this;
  }

  private allGroups(): Group[] {
    const trailing = this.columns.length - this.openGroupStart;
    return trailing > 0 ? [...this.groups, { name: this.openGroupName, count: trailing }] : [...this.groups];
  }

  private columnWidths(): number[] {
    return this.columns.map((col) =>
      Math.max(stringWidth(col.header), ...col.cells.map((c) => stringWidth(c)))
    );
  }

  private layouts(widths: number[], expandForNames: boolean): GroupLayout[] {
    let first = 0;
    return this.allGroups().map(({ name, count }) => {
      const natural = widths.slice(first, first + count).reduce((a, b) => a + b, 0) + count - 1;
      const span = expandForNames ? Math.max(natural, name ? stringWidth(name) : 0) : natural;
      const layout = { name, first, count, span };
      first += count;
      return layout;
    });
  }

  private formatRow(
    layouts: GroupLayout[],
    widths: number[],
    formatCell: (col: Column, width: number) => string
  ): string {
    return layouts
      .map((g) => {
        const cells = this.columns
          .slice(g.first, g.first + g.count)
          .map((col, k) => formatCell(col, widths[g.first + k]))
          .join(" ");
        return ljust(cells, g.span);
      })
      .join(" ")
      .trimEnd();
  }

  /** Lines to print: optional group header, column header, then rows. */
  render(): string[] {
    if (this.columns.length === 0) return [];

    const widths = this.columnWidths();
    const hasNamedGroups = this.allGroups().some((g) => g.name !== null);
    const layouts = this.layouts(widths, hasNamedGroups);
    const lines: string[] = [];

    if (hasNamedGroups) {
      lines.push(layouts.map((g) => ljust(g.name ?? "", g.span)).join(" ").trimEnd());
    }
    lines.push(this.formatRow(layouts, widths, (col, w) => ljust(col.header, w)));

    const rowCount = this.columns[0].cells.length;
    for (let row = 0; row < rowCount; row++) {
      lines.push(this.formatRow(layouts, widths, (col, w) => rjust(col.cells[row] ?? MISSING, w)));
    }
    return lines;
  }

  print(write: (line: string) => void = (line) => console.log(line)): void {
    for (const line of this.render()) write(line);
  }
}
