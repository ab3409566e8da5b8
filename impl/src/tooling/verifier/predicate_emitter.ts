//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { Predicate, PredicateTag } from "../../ast/netkat";
import { SymbolicPacket } from "../../ast/packet";
import { SMTCallGeneral, SMTCallSimple, SMTConst, SMTExp } from "./smt_exp";
import { VerificationContext } from "./verification_context";

//negation is pushed to the tests, a negated test becomes the field's not_equals macro
function emitNegatedPredicate(ctx: VerificationContext, pred: Predicate, pkt: SymbolicPacket): SMTExp {
    switch (pred.tag) {
        case PredicateTag.True:
            return SMTConst.falseConst;
        case PredicateTag.False:
            return SMTConst.trueConst;
        case PredicateTag.Test: {
            const macro = ctx.macros.notEquals(pred.field);
            return new SMTCallGeneral(macro.fname, [ctx.packetVar(pkt), SMTConst.makeInt(pred.value)]);
        }
        case PredicateTag.Neg:
            return emitPredicate(ctx, pred.pred, pkt);
        case PredicateTag.And:
            return SMTCallSimple.makeOrOf(emitNegatedPredicate(ctx, pred.lhs, pkt), emitNegatedPredicate(ctx, pred.rhs, pkt));
        case PredicateTag.Or:
            return SMTCallSimple.makeAndOf(emitNegatedPredicate(ctx, pred.lhs, pkt), emitNegatedPredicate(ctx, pred.rhs, pkt));
    }
}

function emitPredicate(ctx: VerificationContext, pred: Predicate, pkt: SymbolicPacket): SMTExp {
    switch (pred.tag) {
        case PredicateTag.True:
            return SMTConst.trueConst;
        case PredicateTag.False:
            return SMTConst.falseConst;
        case PredicateTag.Test: {
            const macro = ctx.macros.equals(pred.field);
            return new SMTCallGeneral(macro.fname, [ctx.packetVar(pkt), SMTConst.makeInt(pred.value)]);
        }
        case PredicateTag.Neg:
            return emitNegatedPredicate(ctx, pred.pred, pkt);
        case PredicateTag.And:
            return SMTCallSimple.makeAndOf(emitPredicate(ctx, pred.lhs, pkt), emitPredicate(ctx, pred.rhs, pkt));
        case PredicateTag.Or:
            return SMTCallSimple.makeOrOf(emitPredicate(ctx, pred.lhs, pkt), emitPredicate(ctx, pred.rhs, pkt));
    }
}

export {
    emitPredicate, emitNegatedPredicate
};
