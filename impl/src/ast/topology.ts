//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { collectLinks, filter, link, parOf, pfalse, Policy, PolicyLink } from "./netkat";

enum TopologyNodeKind {
    Host = "Host",
    Switch = "Switch"
}

class TopologyNode {
    readonly kind: TopologyNodeKind;
    readonly name: string;
    readonly id: bigint;

    constructor(kind: TopologyNodeKind, name: string, id: bigint) {
        this.kind = kind;
        this.name = name;
        this.id = id;
    }

    toString(): string {
        return this.name;
    }
}

class TopologyEdge {
    readonly src: TopologyNode;
    readonly srcPort: bigint;
    readonly dst: TopologyNode;
    readonly dstPort: bigint;

    constructor(src: TopologyNode, srcPort: bigint, dst: TopologyNode, dstPort: bigint) {
        this.src = src;
        this.srcPort = srcPort;
        this.dst = dst;
        this.dstPort = dstPort;
    }

    toString(): string {
        return `${this.src.name}:${this.srcPort} -> ${this.dst.name}:${this.dstPort}`;
    }
}

type TopologyLookupKind = "NodeNotFound" | "NoPathBetween";

class TopologyLookupError extends Error {
    readonly kind: TopologyLookupKind;

    constructor(kind: TopologyLookupKind, msg: string) {
        super(msg);
        this.name = "TopologyLookupError";
        this.kind = kind;
    }
}

/**
 * Directed multigraph of hosts and switches. Edges carry the port they leave from and the port
 * they arrive at; all path computations use unit weights.
 */
class Topology {
    private readonly nodes: Map<string, TopologyNode> = new Map<string, TopologyNode>();
    private readonly edges: TopologyEdge[] = [];

    private lookupNode(name: string, op: string): TopologyNode {
        const node = this.nodes.get(name);
        if (node === undefined) {
            throw new TopologyLookupError("NodeNotFound", `Can't find ${name} to get ${op}`);
        }

        return node;
    }

    private outEdges(node: TopologyNode): TopologyEdge[] {
        return this.edges.filter((e) => e.src === node);
    }

    addHost(name: string, id?: bigint): TopologyNode {
        const node = new TopologyNode(TopologyNodeKind.Host, name, id ?? 0n);
        this.nodes.set(name, node);

        return node;
    }

    addSwitch(name: string, id: bigint): TopologyNode {
        const node = new TopologyNode(TopologyNodeKind.Switch, name, id);
        this.nodes.set(name, node);

        return node;
    }

    addSwitchEdge(src: string, srcPort: bigint, dst: string, dstPort: bigint): TopologyEdge {
        const edge = new TopologyEdge(this.lookupNode(src, "add_switch_edge"), srcPort, this.lookupNode(dst, "add_switch_edge"), dstPort);
        this.edges.push(edge);

        return edge;
    }

    hasNode(name: string): boolean {
        return this.nodes.has(name);
    }

    getVertices(): TopologyNode[] {
        return [...this.nodes.values()];
    }

    getEdges(): TopologyEdge[] {
        return [...this.edges];
    }

    getHosts(): TopologyNode[] {
        return this.getVertices().filter((n) => n.kind === TopologyNodeKind.Host);
    }

    getSwitches(): TopologyNode[] {
        return this.getVertices().filter((n) => n.kind === TopologyNodeKind.Switch);
    }

    getSwitchIds(): bigint[] {
        return this.getSwitches().map((n) => n.id);
    }

    //ports of the first edge from s to d
    getPorts(s: string, d: string): { srcPort: bigint, dstPort: bigint } {
        const src = this.lookupNode(s, "get_ports");
        const dst = this.lookupNode(d, "get_ports");

        const edge = this.edges.find((e) => e.src === src && e.dst === dst);
        if (edge === undefined) {
            throw new TopologyLookupError("NodeNotFound", `Can't find ${s} to get_ports to ${d}`);
        }

        return { srcPort: edge.srcPort, dstPort: edge.dstPort };
    }

    //ports the switch sends from, then ports it receives on
    portsOfSwitch(s: string): bigint[] {
        const node = this.lookupNode(s, "ports_of_switch");

        const sports = this.outEdges(node).map((e) => e.srcPort);
        const pports = this.edges.filter((e) => e.dst === node).map((e) => e.dstPort);
        return [...sports, ...pports];
    }

    nextHop(n: string, port: bigint): TopologyNode {
        const node = this.lookupNode(n, "next_hop");

        const edge = this.outEdges(node).find((e) => e.srcPort === port);
        if (edge === undefined) {
            throw new TopologyLookupError("NodeNotFound", `next_hop: Port ${port} is not connected`);
        }

        return edge.dst;
    }

    /**
     * Breadth first search from s, returns the edges of a shortest path to d or the empty list when
     * d is unreachable (or s is d).
     */
    shortestPath(s: string, d: string): TopologyEdge[] {
        const src = this.lookupNode(s, "shortest_path");
        const dst = this.lookupNode(d, "shortest_path");

        if (src === dst) {
            return [];
        }

        let via = new Map<TopologyNode, TopologyEdge>();
        let visited = new Set<TopologyNode>([src]);
        let worklist: TopologyNode[] = [src];
        while (worklist.length !== 0 && !visited.has(dst)) {
            const node = worklist.shift();
            if (node === undefined) {
                break;
            }

            this.outEdges(node).forEach((e) => {
                if (!visited.has(e.dst)) {
                    visited.add(e.dst);
                    via.set(e.dst, e);
                    worklist.push(e.dst);
                }
            });
        }

        let path: TopologyEdge[] = [];
        let edge = via.get(dst);
        while (edge !== undefined) {
            path.push(edge);
            edge = via.get(edge.src);
        }

        return path.reverse();
    }

    requirePath(s: string, d: string): TopologyEdge[] {
        const path = this.shortestPath(s, d);
        if (path.length === 0 && s !== d) {
            throw new TopologyLookupError("NoPathBetween", `No path between ${s} and ${d}`);
        }

        return path;
    }

    //diameter over ordered switch pairs, unreachable pairs count as 0
    longestShortest(): number {
        const switches = this.getSwitches();

        let longest = 0;
        switches.forEach((s) => {
            switches.forEach((d) => {
                if (s !== d) {
                    longest = Math.max(longest, this.shortestPath(s.name, d.name).length);
                }
            });
        });

        return longest;
    }

    hopPolicy(): Policy {
        const links = this.edges
            .filter((e) => e.src.kind === TopologyNodeKind.Switch && e.dst.kind === TopologyNodeKind.Switch)
            .map((e) => link(e.src.id, e.srcPort, e.dst.id, e.dstPort));

        return links.length === 0 ? filter(pfalse) : parOf(...links);
    }

    static switchName(id: bigint): string {
        return `s${id}`;
    }

    //switches are named s<id>
    static fromPolicy(pol: Policy): Topology {
        const topo = new Topology();

        const links: PolicyLink[] = collectLinks(pol, []);
        links.forEach((lnk) => {
            [lnk.srcSwitch, lnk.dstSwitch].forEach((id) => {
                if (!topo.hasNode(Topology.switchName(id))) {
                    topo.addSwitch(Topology.switchName(id), id);
                }
            });

            topo.addSwitchEdge(Topology.switchName(lnk.srcSwitch), lnk.srcPort, Topology.switchName(lnk.dstSwitch), lnk.dstPort);
        });

        return topo;
    }
}

export type { TopologyLookupKind };
export {
    TopologyNodeKind, TopologyNode, TopologyEdge,
    TopologyLookupError,
    Topology
};
