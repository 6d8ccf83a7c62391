import type { Polygon, Rect, Vector2 } from './types'

/**
 * Bounding rectangle of a set of points
 */
export function rectFromPoints(points: Vector2[]): Rect {
    if (points.length === 0) {
        return { x: 0, y: 0, width: 0, height: 0 }
    }

    let minX = Infinity, minY = Infinity
    let maxX = -Infinity, maxY = -Infinity
    for (const p of points) {
        if (p.x < minX) minX = p.x
        if (p.y < minY) minY = p.y
        if (p.x > maxX) maxX = p.x
        if (p.y > maxY) maxY = p.y
    }
    return { x: minX, y: minY, width: maxX - minX, height: maxY - minY }
}

/**
 * Strict overlap of two rectangles; rectangles that only share an edge do not overlap
 */
export function rectsIntersect(a: Rect, b: Rect): boolean {
    return (
        a.x < b.x + b.width &&
        b.x < a.x + a.width &&
        a.y < b.y + b.height &&
        b.y < a.y + a.height
    )
}

/**
 * `inner` lies entirely inside `outer` (edges may touch)
 */
export function rectContains(outer: Rect, inner: Rect): boolean {
    return (
        inner.x >= outer.x &&
        inner.y >= outer.y &&
        inner.x + inner.width <= outer.x + outer.width &&
        inner.y + inner.height <= outer.y + outer.height
    )
}

export function rectToPolygon(rect: Rect): Polygon {
    return [
        { x: rect.x, y: rect.y },
        { x: rect.x + rect.width, y: rect.y },
        { x: rect.x + rect.width, y: rect.y + rect.height },
        { x: rect.x, y: rect.y + rect.height },
    ]
}

function project(polygon: Polygon, axis: Vector2): [number, number] {
    let min = Infinity, max = -Infinity
    for (const p of polygon) {
        const proj = p.x * axis.x + p.y * axis.y
        if (proj < min) min = proj
        if (proj > max) max = proj
    }
    return [min, max]
}

/**
 * SAT: convex polygon vs convex polygon
 *
 * Touching polygons count as intersecting.
 */
export function polygonsIntersect(poly1: Polygon, poly2: Polygon): boolean {
    if (poly1.length < 2 || poly2.length < 2) return false

    for (const polygon of [poly1, poly2]) {
        for (let i = 0; i < polygon.length; i++) {
            const p1 = polygon[i]
            const p2 = polygon[(i + 1) % polygon.length]
            const normal = { x: p2.y - p1.y, y: p1.x - p2.x }
            // degenerate edge (repeated vertex)
            if (normal.x === 0 && normal.y === 0) continue

            const [minA, maxA] = project(poly1, normal)
            const [minB, maxB] = project(poly2, normal)
            if (maxA < minB || maxB < minA) return false
        }
    }
    return true
}
