//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { allFields, Field, fieldAccessor, NO_PACKET_NAME } from "../../ast/packet";
import { SMTCallGeneral, SMTCallSimple, SMTConst, SMTExp, SMTIf, SMTType, SMTVar } from "./smt_exp";
import { SMTFunction } from "./smt_assembly";

enum MacroFamily {
    Equals = "equals",
    NotEquals = "not_equals",
    PacketEqualsExcept = "packet_equals_except",
    Mod = "mod"
}

const nopacket = new SMTConst(NO_PACKET_NAME);

function macroKey(family: MacroFamily, field: Field): string {
    return `${family}@${field}`;
}

function fieldOf(f: Field, pkt: SMTExp): SMTExp {
    return new SMTCallGeneral(fieldAccessor(f), [pkt]);
}

/**
 * Named macros (define-fun) created while compiling one query. A key is built at most once, and
 * builders ask for the macros they call before returning, so insertion order is a valid
 * definition order.
 */
class MacroCache {
    private readonly macros: Map<string, SMTFunction> = new Map<string, SMTFunction>();

    getOrCreate(family: MacroFamily, field: Field, builder: (fname: string) => SMTFunction): SMTFunction {
        const key = macroKey(family, field);

        let macro = this.macros.get(key);
        if (macro === undefined) {
            macro = builder(key);
            this.macros.set(key, macro);
        }

        return macro;
    }

    has(family: MacroFamily, field: Field): boolean {
        return this.macros.has(macroKey(family, field));
    }

    get size(): number {
        return this.macros.size;
    }

    allMacros(): SMTFunction[] {
        return [...this.macros.values()];
    }

    macrosOf(family: MacroFamily): SMTFunction[] {
        return [...this.macros.entries()].filter((entry) => entry[0].startsWith(`${family}@`)).map((entry) => entry[1]);
    }

    //(x Packet) (v Int) -- false on the drop sentinel
    equals(f: Field): SMTFunction {
        return this.getOrCreate(MacroFamily.Equals, f, (fname) => {
            const x = new SMTVar("x");
            const v = new SMTVar("v");

            const body = new SMTIf(SMTCallSimple.makeEq(x, nopacket),
                SMTConst.falseConst,
                SMTCallSimple.makeEq(fieldOf(f, x), v)
            );
            return SMTFunction.create(fname, [{ vname: "x", vtype: SMTType.packetType }, { vname: "v", vtype: SMTType.intType }], SMTType.boolType, body);
        });
    }

    //(x Packet) (v Int) -- true on the drop sentinel, uses < and > rather than distinct
    notEquals(f: Field): SMTFunction {
        return this.getOrCreate(MacroFamily.NotEquals, f, (fname) => {
            const x = new SMTVar("x");
            const v = new SMTVar("v");

            const body = new SMTIf(SMTCallSimple.makeEq(x, nopacket),
                SMTConst.trueConst,
                SMTCallSimple.makeOrOf(
                    SMTCallSimple.makeBinOp("<", fieldOf(f, x), v),
                    SMTCallSimple.makeBinOp(">", fieldOf(f, x), v)
                )
            );
            return SMTFunction.create(fname, [{ vname: "x", vtype: SMTType.packetType }, { vname: "v", vtype: SMTType.intType }], SMTType.boolType, body);
        });
    }

    //(x Packet) (y Packet) -- both dropped, or both present and agreeing on every field but f
    packetEqualsExcept(f: Field): SMTFunction {
        return this.getOrCreate(MacroFamily.PacketEqualsExcept, f, (fname) => {
            const x = new SMTVar("x");
            const y = new SMTVar("y");

            const fieldeqs = allFields
                .filter((g) => g !== f)
                .map((g) => SMTCallSimple.makeEq(fieldOf(g, x), fieldOf(g, y)));

            const body = new SMTIf(SMTCallSimple.makeEq(x, nopacket),
                SMTCallSimple.makeEq(y, nopacket),
                SMTCallSimple.makeAndOf(SMTCallSimple.makeNotEq(y, nopacket), ...fieldeqs)
            );
            return SMTFunction.create(fname, [{ vname: "x", vtype: SMTType.packetType }, { vname: "y", vtype: SMTType.packetType }], SMTType.boolType, body);
        });
    }

    //(x Packet) (y Packet) (v Int) -- y is x with f set to v
    mod(f: Field): SMTFunction {
        return this.getOrCreate(MacroFamily.Mod, f, (fname) => {
            const pee = this.packetEqualsExcept(f);
            const eq = this.equals(f);

            const x = new SMTVar("x");
            const y = new SMTVar("y");
            const v = new SMTVar("v");

            const body = SMTCallSimple.makeAndOf(
                new SMTCallGeneral(pee.fname, [x, y]),
                new SMTCallGeneral(eq.fname, [y, v])
            );
            return SMTFunction.create(fname, [{ vname: "x", vtype: SMTType.packetType }, { vname: "y", vtype: SMTType.packetType }, { vname: "v", vtype: SMTType.intType }], SMTType.boolType, body);
        });
    }
}

export {
    MacroFamily, MacroCache,
    nopacket, fieldOf
};
