//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { beforeEach, describe, expect, it } from "vitest";

import { filter, link, par, ptrue, seq, star } from "../ast/netkat";
import { Topology, TopologyLookupError } from "../ast/topology";

function lookupKind(action: () => unknown): string | undefined {
    try {
        action();
        return undefined;
    }
    catch (ex) {
        return ex instanceof TopologyLookupError ? ex.kind : `unexpected ${ex}`;
    }
}

let topo: Topology;

//s1 -> s2 <-> s3, plus a host hanging off s1
beforeEach(() => {
    topo = new Topology();
    topo.addSwitch("s1", 1n);
    topo.addSwitch("s2", 2n);
    topo.addSwitch("s3", 3n);
    topo.addHost("h1");

    topo.addSwitchEdge("s1", 1n, "s2", 1n);
    topo.addSwitchEdge("s2", 2n, "s3", 1n);
    topo.addSwitchEdge("s3", 1n, "s2", 2n);
    topo.addSwitchEdge("h1", 0n, "s1", 3n);
});

describe("topology accessors", () => {
    it("separates hosts and switches", () => {
        expect(topo.getSwitches().map((n) => n.name)).toEqual(["s1", "s2", "s3"]);
        expect(topo.getHosts().map((n) => n.name)).toEqual(["h1"]);
        expect(topo.getSwitchIds()).toEqual([1n, 2n, 3n]);
        expect(topo.getVertices().length).toBe(4);
        expect(topo.getEdges().length).toBe(4);
    });

    it("finds the ports between two nodes", () => {
        expect(topo.getPorts("s2", "s3")).toEqual({ srcPort: 2n, dstPort: 1n });
        expect(lookupKind(() => topo.getPorts("s1", "s3"))).toBe("NodeNotFound");
    });

    it("lists sending then receiving ports of a switch", () => {
        expect(topo.portsOfSwitch("s2")).toEqual([2n, 1n, 2n]);
        expect(lookupKind(() => topo.portsOfSwitch("s9"))).toBe("NodeNotFound");
    });

    it("follows a port to the next node", () => {
        expect(topo.nextHop("s1", 1n).name).toBe("s2");
        expect(lookupKind(() => topo.nextHop("s1", 7n))).toBe("NodeNotFound");
        expect(lookupKind(() => topo.nextHop("s9", 1n))).toBe("NodeNotFound");
    });

    it("rejects edges to unknown nodes", () => {
        expect(lookupKind(() => topo.addSwitchEdge("s1", 4n, "s9", 1n))).toBe("NodeNotFound");
    });
});

describe("paths", () => {
    it("finds a shortest path", () => {
        expect(topo.shortestPath("s1", "s3").map((e) => e.toString())).toEqual(["s1:1 -> s2:1", "s2:2 -> s3:1"]);
        expect(topo.shortestPath("s1", "s1")).toEqual([]);
    });

    it("returns no path for unreachable pairs", () => {
        expect(topo.shortestPath("s3", "s1")).toEqual([]);
        expect(lookupKind(() => topo.requirePath("s3", "s1"))).toBe("NoPathBetween");
        expect(topo.requirePath("h1", "s3").length).toBe(3);
    });

    it("takes the longest shortest path between switches", () => {
        expect(topo.longestShortest()).toBe(2);
        expect(new Topology().longestShortest()).toBe(0);
    });
});

describe("policies and topologies", () => {
    it("builds one link per switch to switch edge", () => {
        expect(topo.hopPolicy().toString()).toBe("(1@1 => 2@1 + (2@2 => 3@1 + 3@1 => 2@2))");
        expect(new Topology().hopPolicy().toString()).toBe("filter false");
    });

    it("reads the topology back from a program", () => {
        const program = star(seq(filter(ptrue), par(link(1, 1, 2, 1), link(2, 1, 1, 1))));
        const fromprog = Topology.fromPolicy(program);

        expect(fromprog.getSwitches().map((n) => n.name)).toEqual(["s1", "s2"]);
        expect(fromprog.getEdges().length).toBe(2);
        expect(fromprog.longestShortest()).toBe(1);
        expect(fromprog.nextHop("s2", 1n).id).toBe(1n);
    });
});
