//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { Policy, PolicyTag } from "../../ast/netkat";
import { SymbolicPacket } from "../../ast/packet";
import { emitPredicate } from "./predicate_emitter";
import { SMTCallGeneral, SMTCallSimple, SMTConst, SMTExp } from "./smt_exp";
import { VerificationContext } from "./verification_context";
import { errResult, okResult, Result, ShapeError } from "./verifier_errors";

type PolicyRelation = {
    formula: SMTExp,
    output: SymbolicPacket
};

/**
 * Relation between `input` and the packet the policy produces. Filters keep the input packet;
 * every modification allocates a fresh output. Both branches of a parallel composition start from
 * the same input and their outputs are unified.
 */
function emitPolicy(ctx: VerificationContext, pol: Policy, input: SymbolicPacket): Result<PolicyRelation, ShapeError> {
    switch (pol.tag) {
        case PolicyTag.Filter:
            return okResult({ formula: emitPredicate(ctx, pol.pred, input), output: input });
        case PolicyTag.Mod: {
            const output = ctx.freshPacket();
            const macro = ctx.macros.mod(pol.field);

            const formula = new SMTCallGeneral(macro.fname, [ctx.packetVar(input), ctx.packetVar(output), SMTConst.makeInt(pol.value)]);
            return okResult({ formula: formula, output: output });
        }
        case PolicyTag.Par: {
            const lres = emitPolicy(ctx, pol.lhs, input);
            if (!lres.ok) {
                return lres;
            }

            const rres = emitPolicy(ctx, pol.rhs, input);
            if (!rres.ok) {
                return rres;
            }

            const formula = SMTCallSimple.makeAndOf(
                SMTCallSimple.makeOrOf(lres.value.formula, rres.value.formula),
                SMTCallSimple.makeEq(ctx.packetVar(lres.value.output), ctx.packetVar(rres.value.output))
            );
            return okResult({ formula: formula, output: lres.value.output });
        }
        case PolicyTag.Seq: {
            const lres = emitPolicy(ctx, pol.lhs, input);
            if (!lres.ok) {
                return lres;
            }

            const rres = emitPolicy(ctx, pol.rhs, lres.value.output);
            if (!rres.ok) {
                return rres;
            }

            return okResult({ formula: SMTCallSimple.makeAndOf(lres.value.formula, rres.value.formula), output: rres.value.output });
        }
        case PolicyTag.Star:
            return errResult(new ShapeError("Star", `iteration is only accepted as the outermost (policy; topology)* -- ${pol.toString()}`));
        case PolicyTag.Choice:
            return errResult(new ShapeError("Choice", `probabilistic choice has no logical encoding -- ${pol.toString()}`));
        case PolicyTag.Link:
            return errResult(new ShapeError("Link", `links must be removed before compilation -- ${pol.toString()}`));
    }
}

export type { PolicyRelation };
export {
    emitPolicy
};
