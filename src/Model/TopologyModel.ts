import ipaddr from "ipaddr.js";

export type NetworkNode = {
    id: number,
    hostname: string,
    ipAddr: string | null
};

export class AlreadyExistsException extends Error {
    public hostname: string;

    constructor(hostname: string) {
        super(`Node ${hostname} already exists`);
        this.hostname = hostname;
    }
}

export class IpAddressConflictException extends Error {
    constructor(ip: string) {
        super(`IP ${ip} already exists in this network`);
    }
}

export class MalformedIpAddressException extends Error {
    constructor(ip: string, reason: string = "is not a valid IP address") {
        super(`IP ${ip} ${reason}`);
    }
}

export class AddressPoolExhaustedException extends Error {
    constructor(network: string, prefixLength: number, requested: number) {
        super(`Network ${network}/${prefixLength} cannot hold ${requested} hosts`);
    }
}

export class HostNameUnresolvedException extends Error {
    constructor(hostname: string) {
        super(`Hostname ${hostname} is unresolved`);
    }
}

function toUint32(ip: string): number {
    let o = ipaddr.IPv4.parse(ip).octets;
    return ((o[0] << 24) | (o[1] << 16) | (o[2] << 8) | o[3]) >>> 0;
}

function fromUint32(value: number): string {
    return new ipaddr.IPv4([
        (value >>> 24) & 0xff,
        (value >>> 16) & 0xff,
        (value >>> 8) & 0xff,
        value & 0xff
    ]).toString();
}

export class TopologyModel {
    protected nodes_: NetworkNode[] = [];
    protected network_: string | null = null;
    protected prefixLength_: number = 0;

    public get nodes(): ReadonlyArray<NetworkNode> {
        return this.nodes_;
    }

    public get size(): number {
        return this.nodes_.length;
    }

    public get hostnames(): Array<string> {
        return this.nodes_.map(n => n.hostname);
    }

    public get addresses(): Array<string> {
        return this.nodes_.map(n => {
            if (!n.ipAddr)
                throw new HostNameUnresolvedException(n.hostname);

            return n.ipAddr;
        });
    }

    public get network(): string | null {
        return this.network_ ? `${this.network_}/${this.prefixLength_}` : null;
    }

    public getNode(id: number): NetworkNode | null {
        return this.nodes_[id] ?? null;
    }

    public getNodeByHostname(hostname: string): NetworkNode | null {
        for (let i = 0; i < this.nodes_.length; i++)
            if (this.nodes_[i].hostname === hostname)
                return this.nodes_[i];

        return null;
    }

    public getNodeByIP(ip: string): NetworkNode | null {
        for (let i = 0; i < this.nodes_.length; i++)
            if (this.nodes_[i].ipAddr === ip)
                return this.nodes_[i];

        return null;
    }

    public addressOf(id: number): string {
        let node = this.getNode(id);
        if (!node || !node.ipAddr)
            throw new HostNameUnresolvedException(node?.hostname ?? `node${id}`);

        return node.ipAddr;
    }

    public addNode(hostname: string): NetworkNode {
        if (this.getNodeByHostname(hostname))
            throw new AlreadyExistsException(hostname);

        let node: NetworkNode = {id: this.nodes_.length, hostname, ipAddr: null};
        this.nodes_.push(node);

        return node;
    }

    public createNodes(count: number, prefix: string = "node"): NetworkNode[] {
        let created: NetworkNode[] = [];
        for (let i = 0; i < count; i++)
            created.push(this.addNode(prefix + this.nodes_.length));

        return created;
    }

    public setAddress(hostname: string, ip: string): void {
        let node = this.getNodeByHostname(hostname);
        if (!node)
            throw new HostNameUnresolvedException(hostname);

        if (!ipaddr.IPv4.isValidFourPartDecimal(ip))
            throw new MalformedIpAddressException(ip);

        if (this.network_) {
            let range = ipaddr.IPv4.parse(this.network_);
            if (!ipaddr.IPv4.parse(ip).match(range, this.prefixLength_))
                throw new MalformedIpAddressException(ip, `is outside of ${this.network}`);
        }

        let existing = this.getNodeByIP(ip);
        if (existing && existing !== node)
            throw new IpAddressConflictException(ip);

        node.ipAddr = ip;
    }

    /**
     * Hands out a contiguous block of host addresses, in node order, starting
     * right after the network address.
     */
    public assignAddresses(network: string, prefixLength: number): void {
        if (!ipaddr.IPv4.isValidFourPartDecimal(network))
            throw new MalformedIpAddressException(network);

        if (!Number.isInteger(prefixLength) || prefixLength < 1 || prefixLength > 30)
            throw new MalformedIpAddressException(`${network}/${prefixLength}`, "has an unsupported prefix length");

        let base = toUint32(network);
        let mask = toUint32(ipaddr.IPv4.subnetMaskFromPrefixLength(prefixLength).toString());
        if (((base & mask) >>> 0) !== base)
            throw new MalformedIpAddressException(network, `is not a /${prefixLength} network address`);

        let hosts = 2 ** (32 - prefixLength) - 2;
        if (this.nodes_.length > hosts)
            throw new AddressPoolExhaustedException(network, prefixLength, this.nodes_.length);

        this.nodes_.forEach(node => node.ipAddr = null);
        this.network_ = network;
        this.prefixLength_ = prefixLength;
        this.nodes_.forEach((node, i) => this.setAddress(node.hostname, fromUint32(base + i + 1)));
    }
}
