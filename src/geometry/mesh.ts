import { BufferAttribute, BufferGeometry } from 'three';

export type Bounds3 = {
  min: [number, number, number];
  max: [number, number, number];
};

/**
 * Per-vertex normals as the normalized sum of incident face normals (area weighted,
 * oriented by counter-clockwise winding). Vertices without faces get a zero normal.
 */
export const computeVertexNormals = (vertices: Float32Array, faces: Uint32Array): Float32Array => {
  if (vertices.length % 3 !== 0) {
    throw new RangeError(`Vertex buffer length ${vertices.length} is not a multiple of 3`);
  }
  if (faces.length % 3 !== 0) {
    throw new RangeError(`Face buffer length ${faces.length} is not a multiple of 3`);
  }
  const geometry = new BufferGeometry();
  geometry.setAttribute('position', new BufferAttribute(vertices, 3));
  geometry.setIndex(new BufferAttribute(faces, 1));
  geometry.computeVertexNormals();
  const normal = geometry.getAttribute('normal');
  const out = new Float32Array(vertices.length);
  for (let i = 0; i < normal.count; i++) {
    out[i * 3] = normal.getX(i);
    out[i * 3 + 1] = normal.getY(i);
    out[i * 3 + 2] = normal.getZ(i);
  }
  geometry.dispose();
  return out;
};

export const emptyBounds = (): Bounds3 => ({
  min: [Infinity, Infinity, Infinity],
  max: [-Infinity, -Infinity, -Infinity],
});

export const expandBounds = (bounds: Bounds3, vertices: ArrayLike<number>): Bounds3 => {
  for (let i = 0; i + 2 < vertices.length; i += 3) {
    for (let axis = 0; axis < 3; axis++) {
      const value = vertices[i + axis];
      if (value < bounds.min[axis]) bounds.min[axis] = value;
      if (value > bounds.max[axis]) bounds.max[axis] = value;
    }
  }
  return bounds;
};

export const isEmptyBounds = (bounds: Bounds3): boolean => bounds.min[0] > bounds.max[0];
