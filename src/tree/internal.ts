// Load order for the tree classes. Every tree module imports its siblings
// from here, never directly, so the base class is defined before any
// subclass evaluates its `extends` clause.

export * from "./base";
export * from "./tensor-tree";
export * from "./view-tree";
export * from "./stacked-tree";
export * from "./sub-tree";
