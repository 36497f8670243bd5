/**
 * Polyline Module Exports
 */

export { Polyline2d, type PolylineSegment2d } from "./Polyline2d";
export { Polyline3d, type PolylineSegment3d } from "./Polyline3d";
export { polylineCentroid, polylineLength, type VertexOps } from "./PolylineMeasures";
