// The slice of the Docker Engine API payloads this tool reads. dockerode's own
// ContainerInfo, NetworkInspectInfo and ContainerInspectInfo all satisfy these,
// and the test doubles only have to fill in what is listed here.

interface DockerEndpointSettings {
    Aliases?: string[] | null;
    NetworkID?: string;
    IPAddress?: string;
}

interface DockerContainerNetworkMap {
    [networkName: string]: DockerEndpointSettings | null | undefined;
}

interface DockerContainerSummary {
    Id?: string;
    Names?: string[] | null;
    NetworkSettings?: {
        Networks?: DockerContainerNetworkMap | null;
    } | null;
}

interface DockerContainerDetail {
    Id: string;
    Name: string;
    NetworkSettings: {
        Networks: DockerContainerNetworkMap;
    };
}

interface DockerNetworkSummary {
    Id?: string;
    Name: string;
    Driver: string;
}

interface DockerNetworkContainerList {
    [id: string]: {
        Name: string;
        IPv4Address?: string;
    };
}

interface DockerNetworkDetail extends DockerNetworkSummary {
    Containers?: DockerNetworkContainerList;
}
