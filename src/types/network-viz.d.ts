interface VisualizeOptions {
    onlyNetwork: string,
    container: string,
    noAliases: boolean,
}

interface VizConfig extends VisualizeOptions {
    noColor: boolean,
    dockerSocket: string,
}

// Anything text can be written to: process.stdout, a Writable, or a test buffer
interface OutputSink {
    write(text: string): unknown;
}

interface ContainerListOptions {
    // Include stopped containers; defaults to true
    all?: boolean,
}

interface NetworkListOptions {
    drivers?: string[],
}
