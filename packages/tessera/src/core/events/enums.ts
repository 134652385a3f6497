export enum ElementState {
    Pressed = "pressed",
    Released = "released",
}
