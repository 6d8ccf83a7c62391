export interface Vector2 {
    x: number
    y: number
}

// Axis-aligned rectangle, (x, y) is the top-left corner (screen coordinates, y grows downward)
export interface Rect {
    x: number
    y: number
    width: number
    height: number
}

// Convex polygon, vertices in order
export type Polygon = Vector2[]
