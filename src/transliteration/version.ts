/** Stamped into every built transliterator and its dump */
export const GRAPH_TRANSLITERATOR_VERSION = '1.0.0';
