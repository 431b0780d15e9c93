export type SerializerOptions = {
  /**
   * How many names may be on the current path while nested entities are still expanded.
   * 0 renders every reference in its raw form; 1 (default) expands the root's children.
   */
  expandDepth: number;
};
