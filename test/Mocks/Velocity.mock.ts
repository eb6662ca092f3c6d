export class Velocity {
    constructor(public dx = 0, public dy = 0) {}
}
