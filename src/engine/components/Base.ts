export type BaseShape = 'square' | 'circle' | 'triangle' | 'hexagon';

export interface Base {
  id: string;
  x: number;
  y: number;
  shape: BaseShape;
  /** Display name shown by the presentation layer */
  name: string;
}

export function cloneBase(base: Base): Base {
  return { ...base };
}
