//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { beforeEach, describe, expect, it } from "vitest";

import { and, choice, filter, link, mod, neg, or, par, pfalse, ptrue, seq, star, test } from "../ast/netkat";
import { Field, SymbolicPacket } from "../ast/packet";
import { MacroCache, MacroFamily } from "../tooling/verifier/macro_cache";
import { emitPolicy } from "../tooling/verifier/policy_emitter";
import { emitPredicate } from "../tooling/verifier/predicate_emitter";
import { unroll } from "../tooling/verifier/unroller";
import { VerificationContext } from "../tooling/verifier/verification_context";

let ctx: VerificationContext;
let x: SymbolicPacket;

beforeEach(() => {
    ctx = new VerificationContext();
    x = ctx.freshPacket();
});

describe("predicate emission", () => {
    it("uses the equality macro for tests", () => {
        expect(x.name).toBe("pkt@0");
        expect(emitPredicate(ctx, test(Field.Switch, 1), x).emitSMT2(undefined)).toBe("(equals@Switch pkt@0 1)");
        expect(emitPredicate(ctx, ptrue, x).emitSMT2(undefined)).toBe("true");
    });

    it("pushes negation to the tests", () => {
        expect(emitPredicate(ctx, neg(test(Field.Switch, 1)), x).emitSMT2(undefined)).toBe("(not_equals@Switch pkt@0 1)");
        expect(emitPredicate(ctx, neg(neg(test(Field.Switch, 1))), x).emitSMT2(undefined)).toBe("(equals@Switch pkt@0 1)");
        expect(emitPredicate(ctx, neg(ptrue), x).emitSMT2(undefined)).toBe("false");
    });

    it("applies De Morgan to negated connectives", () => {
        const a = test(Field.Switch, 1);
        const b = test(Field.InPort, 2);

        expect(emitPredicate(ctx, neg(and(a, b)), x).emitSMT2(undefined)).toBe("(or (not_equals@Switch pkt@0 1) (not_equals@InPort pkt@0 2))");
        expect(emitPredicate(ctx, neg(or(a, b)), x).emitSMT2(undefined)).toBe("(and (not_equals@Switch pkt@0 1) (not_equals@InPort pkt@0 2))");
    });

    it("creates one equality macro per field", () => {
        emitPredicate(ctx, and(test(Field.Switch, 1), or(test(Field.Switch, 2), test(Field.InPort, 3))), x);
        emitPredicate(ctx, test(Field.Switch, 4), x);

        expect(ctx.macros.macrosOf(MacroFamily.Equals).map((m) => m.fname)).toEqual(["equals@Switch", "equals@InPort"]);
        expect(ctx.macros.size).toBe(2);
    });
});

describe("macro cache", () => {
    it("defines equality as false on the drop sentinel", () => {
        const mc = new MacroCache();
        expect(mc.equals(Field.Switch).emitSMT2()).toBe(
            "(define-fun equals@Switch ((x Packet) (v Int)) Bool\n  (ite (= x nopacket)\n    false\n    (= (pkt@Switch x) v)\n  )\n)"
        );
    });

    it("defines disequality by ordering, true on the drop sentinel", () => {
        const mc = new MacroCache();
        expect(mc.notEquals(Field.Vlan).emitSMT2()).toBe(
            "(define-fun not_equals@Vlan ((x Packet) (v Int)) Bool\n  (ite (= x nopacket)\n    true\n    (or\n      (< (pkt@Vlan x) v)\n      (> (pkt@Vlan x) v)\n    )\n  )\n)"
        );
    });

    it("returns the same macro for the same key", () => {
        const mc = new MacroCache();
        expect(mc.notEquals(Field.Vlan)).toBe(mc.notEquals(Field.Vlan));
        expect(mc.has(MacroFamily.NotEquals, Field.Vlan)).toBe(true);
        expect(mc.has(MacroFamily.Equals, Field.Vlan)).toBe(false);
    });

    it("defines modification through the macros it calls", () => {
        const mc = new MacroCache();
        const macro = mc.mod(Field.Vlan);

        expect(mc.allMacros().map((m) => m.fname)).toEqual(["packet_equals_except@Vlan", "equals@Vlan", "mod@Vlan"]);
        expect(macro.emitSMT2()).toBe(
            "(define-fun mod@Vlan ((x Packet) (y Packet) (v Int)) Bool\n  (and\n    (packet_equals_except@Vlan x y)\n    (equals@Vlan y v)\n  )\n)"
        );
    });

    it("compares every field but the modified one", () => {
        const mc = new MacroCache();
        const text = mc.packetEqualsExcept(Field.Vlan).emitSMT2();

        expect(text.match(/\(= \(pkt@/g)?.length).toBe(11);
        expect(text.includes("(pkt@Vlan x)")).toBe(false);
        expect(text.includes("(not (= y nopacket))")).toBe(true);
    });
});

describe("policy emission", () => {
    it("keeps the input packet through a filter", () => {
        const res = emitPolicy(ctx, filter(test(Field.Switch, 1)), x);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.output).toBe(x);
            expect(res.value.formula.emitSMT2(undefined)).toBe("(equals@Switch pkt@0 1)");
        }
    });

    it("allocates an output packet per modification", () => {
        const res = emitPolicy(ctx, mod(Field.Switch, 2), x);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.output.name).toBe("pkt@1");
            expect(res.value.formula.emitSMT2(undefined)).toBe("(mod@Switch pkt@0 pkt@1 2)");
        }
    });

    it("unifies the outputs of a parallel composition", () => {
        const res = emitPolicy(ctx, par(mod(Field.Switch, 1), mod(Field.Switch, 2)), x);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.output.name).toBe("pkt@1");
            expect(res.value.formula.emitSMT2(undefined)).toBe("(and (or (mod@Switch pkt@0 pkt@1 1) (mod@Switch pkt@0 pkt@2 2)) (= pkt@1 pkt@2))");
        }
    });

    it("chains a sequence", () => {
        const res = emitPolicy(ctx, seq(mod(Field.Switch, 1), filter(test(Field.InPort, 3))), x);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.output.name).toBe("pkt@1");
            expect(res.value.formula.emitSMT2(undefined)).toBe("(and (mod@Switch pkt@0 pkt@1 1) (equals@InPort pkt@1 3))");
        }
    });

    it("rejects constructs outside the accepted fragment", () => {
        const cases = [
            { pol: star(filter(ptrue)), construct: "Star" },
            { pol: seq(filter(ptrue), choice(filter(ptrue), filter(pfalse), 0.5)), construct: "Choice" },
            { pol: link(1, 1, 2, 1), construct: "Link" }
        ];

        cases.forEach((cc) => {
            const res = emitPolicy(ctx, cc.pol, x);
            expect(res.ok).toBe(false);
            if (!res.ok) {
                expect(res.error.construct).toBe(cc.construct);
                expect(res.error.message.startsWith(`policy not in accepted normal form -- ${cc.construct}:`)).toBe(true);
            }
        });
    });
});

describe("unrolling", () => {
    it("has one frontier entry per depth", () => {
        const res = unroll(ctx, star(seq(filter(ptrue), filter(ptrue))), x, 2);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.frontier.map((v) => v.name)).toEqual(["pkt@0", "pkt@0", "pkt@0"]);
        }
    });

    it("compiles every depth independently from the input", () => {
        const res = unroll(ctx, star(seq(mod(Field.Switch, 1), filter(ptrue))), x, 2);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.frontier.map((v) => v.name)).toEqual(["pkt@0", "pkt@1", "pkt@3"]);
            expect(ctx.declaredPackets().length).toBe(4);
        }
    });

    it("lets every depth be satisfied by a dropped packet", () => {
        const res = unroll(ctx, star(seq(mod(Field.Switch, 1), filter(test(Field.InPort, 2)))), x, 1);
        expect(res.ok).toBe(true);
        if (res.ok) {
            expect(res.value.formula.emitSMT2(undefined)).toBe(
                "(and (or true (= pkt@0 nopacket)) (or (and (mod@Switch pkt@0 pkt@1 1) (equals@InPort pkt@1 2)) (= pkt@1 nopacket)))"
            );

            const text = res.value.formula.emitSMT2("  ");
            expect(text.includes("; attempting to forward in 1 hops")).toBe(true);
            expect(text.includes("; hop 1 of 1: topology")).toBe(true);
            expect(text.includes("; blacklisting pkt@1")).toBe(true);
        }
    });

    it("requires the (policy; topology)* shape", () => {
        const notstar = unroll(ctx, filter(ptrue), x, 1);
        expect(notstar.ok).toBe(false);
        if (!notstar.ok) {
            expect(notstar.error.construct).toBe("Filter");
        }

        const notseq = unroll(ctx, star(par(filter(ptrue), filter(ptrue))), x, 1);
        expect(notseq.ok).toBe(false);
        if (!notseq.ok) {
            expect(notseq.error.construct).toBe("Par");
        }

        const nested = unroll(ctx, star(seq(filter(ptrue), star(filter(ptrue)))), x, 1);
        expect(nested.ok).toBe(false);
        if (!nested.ok) {
            expect(nested.error.construct).toBe("Star");
        }
    });

    it("asserts on a negative bound", () => {
        expect(() => unroll(ctx, star(seq(filter(ptrue), filter(ptrue))), x, -1)).toThrow();
    });
});
