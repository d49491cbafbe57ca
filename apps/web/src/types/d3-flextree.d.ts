declare module "d3-flextree" {
  export interface FlextreeNode<Datum> {
    data: Datum;
    x: number;
    y: number;
    depth: number;
    parent: FlextreeNode<Datum> | null;
    children?: Array<FlextreeNode<Datum>>;
    descendants(): Array<FlextreeNode<Datum>>;
  }

  export interface FlextreeOptions<Datum> {
    nodeSize?: (node: FlextreeNode<Datum>) => [number, number];
    spacing?: number | ((a: FlextreeNode<Datum>, b: FlextreeNode<Datum>) => number);
  }

  export interface FlextreeLayout<Datum> {
    (root: FlextreeNode<Datum>): FlextreeNode<Datum>;
    hierarchy(data: Datum, children?: (d: Datum) => Datum[] | null | undefined): FlextreeNode<Datum>;
  }

  export function flextree<Datum>(options?: FlextreeOptions<Datum>): FlextreeLayout<Datum>;

  const d3Flextree: { flextree: typeof flextree };
  export default d3Flextree;
}
