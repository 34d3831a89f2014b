export * from './interface';
export { orient2d, orientation, incircle, inCircle, Orientation, CirclePosition } from './core/predicates';
export { TriangulationError, isTriangulationError } from './core/errors';
export type { TriangulationErrorKind, TriangulationErrorDetails } from './core/errors';
export { Triangulation } from './core/triangulation';
export type { Location } from './core/locate';
export { canonicalize, compareTriangles } from './core/extract';
export { insertAll, triangulate, insertionSequence } from './core/delaunay';
export type { TriangulationResult } from './core/delaunay';
export { gridPoints } from './utils/grid';
export { formatTriangle, formatTriangles } from './utils/format';
export { buildMesh, extractTriangles } from './utils/threeMesh';
export { boundaryEdges, extractBoundaryLoops, orientLoop } from './utils/topo';
export { coverage, delaunayViolations, eulerExpectedTriangles } from './utils/metrics';
export type { Coverage } from './utils/metrics';
