//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { describe, expect, it } from "vitest";

import {
    and, choice, collectLinks, filter, link, mod, neg, parOf, pfalse, PolicyTag, ptrue, removeLinks, seq, seqOf, star, test
} from "../ast/netkat";
import { Field, fieldMax, isField } from "../ast/packet";

describe("packet fields", () => {
    it("knows the header names", () => {
        expect(isField("Switch")).toBe(true);
        expect(isField("TCPDstPort")).toBe(true);
        expect(isField("switch")).toBe(false);
    });

    it("bounds values by field width", () => {
        expect(fieldMax(Field.VlanPcp)).toBe(7n);
        expect(fieldMax(Field.Vlan)).toBe(4095n);
        expect(test(Field.Switch, 18446744073709551615n).toString()).toBe("Switch = 18446744073709551615");

        expect(() => test(Field.VlanPcp, 8)).toThrow();
        expect(() => mod(Field.InPort, -1)).toThrow();
        expect(() => test(Field.Vlan, 1.5)).toThrow();
    });

    it("names the offending value when it rejects one", () => {
        expect(() => test(Field.VlanPcp, 8)).toThrow("value 8 does not fit in field VlanPcp");
        expect(() => mod(Field.InPort, -1)).toThrow("value -1 does not fit in field InPort");
        expect(() => test(Field.Vlan, 1.5)).toThrow("value 1.5 is not an integer");
        expect(() => link(1, 1.5, 2, 1)).toThrow("value 1.5 is not an integer");
    });
});

describe("policy constructors", () => {
    it("prints predicates and policies", () => {
        expect(neg(and(test(Field.Switch, 1), test(Field.InPort, 2))).toString()).toBe("!((Switch = 1 && InPort = 2))");
        expect(seq(filter(ptrue), mod(Field.Vlan, 3)).toString()).toBe("(filter true; Vlan := 3)");
    });

    it("folds unions and sequences to the right", () => {
        expect(parOf().toString()).toBe("filter false");
        expect(seqOf().toString()).toBe("filter true");
        expect(parOf(mod(Field.Vlan, 1), mod(Field.Vlan, 2), mod(Field.Vlan, 3)).toString()).toBe("(Vlan := 1 + (Vlan := 2 + Vlan := 3))");
        expect(seqOf(filter(pfalse)).toString()).toBe("filter false");
    });

    it("rejects probabilities outside [0, 1]", () => {
        expect(() => choice(filter(ptrue), filter(pfalse), 1.5)).toThrow();
    });
});

describe("link elimination", () => {
    it("rewrites a link to a filter and two modifications", () => {
        expect(removeLinks(link(1, 2, 3, 4)).toString()).toBe("(filter (Switch = 1 && InPort = 2); (Switch := 3; InPort := 4))");
    });

    it("recurses under iteration", () => {
        const program = star(seq(filter(ptrue), link(1, 1, 2, 1)));
        expect(removeLinks(program).toString()).toBe("((filter true; (filter (Switch = 1 && InPort = 1); (Switch := 2; InPort := 1))))*");
    });

    it("keeps choice for the compiler to reject", () => {
        const res = removeLinks(choice(link(1, 1, 2, 1), filter(pfalse), 0.5));
        expect(res.tag).toBe(PolicyTag.Choice);
        if (res.tag === PolicyTag.Choice) {
            expect(res.lhs.tag).toBe(PolicyTag.Seq);
            expect(res.probability).toBe(0.5);
        }
    });

    it("collects every link", () => {
        const links = collectLinks(parOf(link(1, 1, 2, 1), seq(link(2, 2, 3, 1), filter(ptrue))), []);
        expect(links.map((l) => l.srcSwitch)).toEqual([1n, 2n]);
        expect(links.map((l) => l.dstPort)).toEqual([1n, 1n]);
    });
});
