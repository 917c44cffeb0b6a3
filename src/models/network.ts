// A network is only ever displayed by its name and driver
export class NetworkInfo {
    constructor(
        readonly name: string,
        readonly driver: string,
    ) {}
}
