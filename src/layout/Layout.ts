/**
 * Nested screen regions: a tree of named layouts, each split into rows or
 * columns sized by the ratio solver.
 */

import { ratioResolve } from './ratio.js';

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** `row` places children side by side; `column` stacks them. */
export type SplitDirection = 'row' | 'column';

export interface LayoutOptions {
  name?: string;
  size?: number;
  minimumSize?: number;
  ratio?: number;
  visible?: boolean;
}

export class Layout {
  readonly name: string | undefined;
  size: number | undefined;
  minimumSize: number;
  ratio: number;
  visible: boolean;
  direction: SplitDirection = 'column';
  private childList: Layout[] = [];

  constructor(options: LayoutOptions = {}) {
    this.name = options.name;
    this.size = options.size;
    this.minimumSize = Math.max(1, options.minimumSize ?? 1);
    this.ratio = Math.max(1, options.ratio ?? 1);
    this.visible = options.visible ?? true;
  }

  get children(): readonly Layout[] {
    return this.childList;
  }

  split(direction: SplitDirection, ...layouts: Layout[]): this {
    this.direction = direction;
    this.childList = layouts;
    return this;
  }

  /** Place children side by side. */
  splitRow(...layouts: Layout[]): this {
    return this.split('row', ...layouts);
  }

  /** Stack children top to bottom. */
  splitColumn(...layouts: Layout[]): this {
    return this.split('column', ...layouts);
  }

  addSplit(...layouts: Layout[]): this {
    this.childList.push(...layouts);
    return this;
  }

  unsplit(): this {
    this.childList = [];
    return this;
  }

  /** Find this layout or a descendant by name. */
  get(name: string): Layout | undefined {
    if (this.name === name) return this;
    for (const child of this.childList) {
      const found = child.get(name);
      if (found) return found;
    }
    return undefined;
  }

  /** Divide a region among the visible children along the split axis. */
  divide(region: Region): Array<[Layout, Region]> {
    const visible = this.childList.filter((child) => child.visible);
    const total = this.direction === 'row' ? region.width : region.height;
    const sizes = ratioResolve(total, visible);

    let offset = 0;
    return visible.map((child, index) => {
      const size = sizes[index];
      const childRegion: Region =
        this.direction === 'row'
          ? { x: region.x + offset, y: region.y, width: size, height: region.height }
          : { x: region.x, y: region.y + offset, width: region.width, height: size };
      offset += size;
      return [child, childRegion];
    });
  }

  /**
   * Compute the region of every named, visible layout in the tree.
   * Hidden layouts and their descendants get no region.
   */
  computeRegions(region: Region): Map<string, Region> {
    const regions = new Map<string, Region>();
    const visit = (layout: Layout, area: Region): void => {
      if (layout.name !== undefined) {
        regions.set(layout.name, area);
      }
      for (const [child, childRegion] of layout.divide(area)) {
        visit(child, childRegion);
      }
    };
    if (this.visible) {
      visit(this, region);
    }
    return regions;
  }
}
