//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

import { Field, checkFieldValue } from "./packet";

type IntLike = bigint | number;

function toValue(f: Field, v: IntLike): bigint {
    assert(typeof v === "bigint" || Number.isSafeInteger(v), `value ${v} is not an integer`);
    return checkFieldValue(f, BigInt(v));
}

enum PredicateTag {
    True = "True",
    False = "False",
    Test = "Test",
    Neg = "Neg",
    And = "And",
    Or = "Or"
}

abstract class PredicateBase {
    abstract readonly tag: PredicateTag;

    abstract toString(): string;
}

class PredicateTrue extends PredicateBase {
    readonly tag: PredicateTag.True = PredicateTag.True;

    toString(): string {
        return "true";
    }
}

class PredicateFalse extends PredicateBase {
    readonly tag: PredicateTag.False = PredicateTag.False;

    toString(): string {
        return "false";
    }
}

class PredicateTest extends PredicateBase {
    readonly tag: PredicateTag.Test = PredicateTag.Test;
    readonly field: Field;
    readonly value: bigint;

    constructor(field: Field, value: IntLike) {
        super();

        this.field = field;
        this.value = toValue(field, value);
    }

    toString(): string {
        return `${this.field} = ${this.value}`;
    }
}

class PredicateNeg extends PredicateBase {
    readonly tag: PredicateTag.Neg = PredicateTag.Neg;
    readonly pred: Predicate;

    constructor(pred: Predicate) {
        super();

        this.pred = pred;
    }

    toString(): string {
        return `!(${this.pred.toString()})`;
    }
}

class PredicateAnd extends PredicateBase {
    readonly tag: PredicateTag.And = PredicateTag.And;
    readonly lhs: Predicate;
    readonly rhs: Predicate;

    constructor(lhs: Predicate, rhs: Predicate) {
        super();

        this.lhs = lhs;
        this.rhs = rhs;
    }

    toString(): string {
        return `(${this.lhs.toString()} && ${this.rhs.toString()})`;
    }
}

class PredicateOr extends PredicateBase {
    readonly tag: PredicateTag.Or = PredicateTag.Or;
    readonly lhs: Predicate;
    readonly rhs: Predicate;

    constructor(lhs: Predicate, rhs: Predicate) {
        super();

        this.lhs = lhs;
        this.rhs = rhs;
    }

    toString(): string {
        return `(${this.lhs.toString()} || ${this.rhs.toString()})`;
    }
}

type Predicate = PredicateTrue | PredicateFalse | PredicateTest | PredicateNeg | PredicateAnd | PredicateOr;

enum PolicyTag {
    Filter = "Filter",
    Mod = "Mod",
    Par = "Par",
    Seq = "Seq",
    Star = "Star",
    Choice = "Choice",
    Link = "Link"
}

abstract class PolicyBase {
    abstract readonly tag: PolicyTag;

    abstract toString(): string;
}

class PolicyFilter extends PolicyBase {
    readonly tag: PolicyTag.Filter = PolicyTag.Filter;
    readonly pred: Predicate;

    constructor(pred: Predicate) {
        super();

        this.pred = pred;
    }

    toString(): string {
        return `filter ${this.pred.toString()}`;
    }
}

class PolicyMod extends PolicyBase {
    readonly tag: PolicyTag.Mod = PolicyTag.Mod;
    readonly field: Field;
    readonly value: bigint;

    constructor(field: Field, value: IntLike) {
        super();

        this.field = field;
        this.value = toValue(field, value);
    }

    toString(): string {
        return `${this.field} := ${this.value}`;
    }
}

class PolicyPar extends PolicyBase {
    readonly tag: PolicyTag.Par = PolicyTag.Par;
    readonly lhs: Policy;
    readonly rhs: Policy;

    constructor(lhs: Policy, rhs: Policy) {
        super();

        this.lhs = lhs;
        this.rhs = rhs;
    }

    toString(): string {
        return `(${this.lhs.toString()} + ${this.rhs.toString()})`;
    }
}

class PolicySeq extends PolicyBase {
    readonly tag: PolicyTag.Seq = PolicyTag.Seq;
    readonly lhs: Policy;
    readonly rhs: Policy;

    constructor(lhs: Policy, rhs: Policy) {
        super();

        this.lhs = lhs;
        this.rhs = rhs;
    }

    toString(): string {
        return `(${this.lhs.toString()}; ${this.rhs.toString()})`;
    }
}

class PolicyStar extends PolicyBase {
    readonly tag: PolicyTag.Star = PolicyTag.Star;
    readonly body: Policy;

    constructor(body: Policy) {
        super();

        this.body = body;
    }

    toString(): string {
        return `(${this.body.toString()})*`;
    }
}

class PolicyChoice extends PolicyBase {
    readonly tag: PolicyTag.Choice = PolicyTag.Choice;
    readonly lhs: Policy;
    readonly rhs: Policy;
    readonly probability: number;

    constructor(lhs: Policy, rhs: Policy, probability: number) {
        super();

        assert(0 <= probability && probability <= 1, `choice probability ${probability} is outside [0, 1]`);

        this.lhs = lhs;
        this.rhs = rhs;
        this.probability = probability;
    }

    toString(): string {
        return `(${this.lhs.toString()} +[${this.probability}] ${this.rhs.toString()})`;
    }
}

class PolicyLink extends PolicyBase {
    readonly tag: PolicyTag.Link = PolicyTag.Link;
    readonly srcSwitch: bigint;
    readonly srcPort: bigint;
    readonly dstSwitch: bigint;
    readonly dstPort: bigint;

    constructor(srcSwitch: IntLike, srcPort: IntLike, dstSwitch: IntLike, dstPort: IntLike) {
        super();

        this.srcSwitch = toValue(Field.Switch, srcSwitch);
        this.srcPort = toValue(Field.InPort, srcPort);
        this.dstSwitch = toValue(Field.Switch, dstSwitch);
        this.dstPort = toValue(Field.InPort, dstPort);
    }

    toString(): string {
        return `${this.srcSwitch}@${this.srcPort} => ${this.dstSwitch}@${this.dstPort}`;
    }
}

type Policy = PolicyFilter | PolicyMod | PolicyPar | PolicySeq | PolicyStar | PolicyChoice | PolicyLink;

const ptrue = new PredicateTrue();
const pfalse = new PredicateFalse();

function test(f: Field, v: IntLike): Predicate {
    return new PredicateTest(f, v);
}

function neg(p: Predicate): Predicate {
    return new PredicateNeg(p);
}

function and(lhs: Predicate, rhs: Predicate): Predicate {
    return new PredicateAnd(lhs, rhs);
}

function or(lhs: Predicate, rhs: Predicate): Predicate {
    return new PredicateOr(lhs, rhs);
}

function filter(p: Predicate): Policy {
    return new PolicyFilter(p);
}

function mod(f: Field, v: IntLike): Policy {
    return new PolicyMod(f, v);
}

function par(lhs: Policy, rhs: Policy): Policy {
    return new PolicyPar(lhs, rhs);
}

function seq(lhs: Policy, rhs: Policy): Policy {
    return new PolicySeq(lhs, rhs);
}

function star(body: Policy): Policy {
    return new PolicyStar(body);
}

function choice(lhs: Policy, rhs: Policy, probability: number): Policy {
    return new PolicyChoice(lhs, rhs, probability);
}

function link(srcSwitch: IntLike, srcPort: IntLike, dstSwitch: IntLike, dstPort: IntLike): Policy {
    return new PolicyLink(srcSwitch, srcPort, dstSwitch, dstPort);
}

//right nested, the empty union drops everything
function parOf(...pols: Policy[]): Policy {
    if (pols.length === 0) {
        return filter(pfalse);
    }

    return pols.slice(0, pols.length - 1).reduceRight((acc, p) => par(p, acc), pols[pols.length - 1]);
}

//right nested, the empty sequence is the identity
function seqOf(...pols: Policy[]): Policy {
    if (pols.length === 0) {
        return filter(ptrue);
    }

    return pols.slice(0, pols.length - 1).reduceRight((acc, p) => seq(p, acc), pols[pols.length - 1]);
}

function linkToPolicy(lnk: PolicyLink): Policy {
    return seq(
        filter(and(test(Field.Switch, lnk.srcSwitch), test(Field.InPort, lnk.srcPort))),
        seq(mod(Field.Switch, lnk.dstSwitch), mod(Field.InPort, lnk.dstPort))
    );
}

/**
 * Rewrite every link primitive into the filter/modification sequence it abbreviates. Star and
 * choice are rebuilt unchanged so the compilers still see (and reject) them.
 */
function removeLinks(pol: Policy): Policy {
    switch (pol.tag) {
        case PolicyTag.Filter:
        case PolicyTag.Mod:
            return pol;
        case PolicyTag.Par:
            return par(removeLinks(pol.lhs), removeLinks(pol.rhs));
        case PolicyTag.Seq:
            return seq(removeLinks(pol.lhs), removeLinks(pol.rhs));
        case PolicyTag.Star:
            return star(removeLinks(pol.body));
        case PolicyTag.Choice:
            return choice(removeLinks(pol.lhs), removeLinks(pol.rhs), pol.probability);
        case PolicyTag.Link:
            return linkToPolicy(pol);
    }
}

function collectLinks(pol: Policy, into: PolicyLink[]): PolicyLink[] {
    switch (pol.tag) {
        case PolicyTag.Filter:
        case PolicyTag.Mod:
            break;
        case PolicyTag.Par:
        case PolicyTag.Seq:
        case PolicyTag.Choice:
            collectLinks(pol.lhs, into);
            collectLinks(pol.rhs, into);
            break;
        case PolicyTag.Star:
            collectLinks(pol.body, into);
            break;
        case PolicyTag.Link:
            into.push(pol);
            break;
    }

    return into;
}

export type { IntLike, Predicate, Policy };
export {
    PredicateTag, PredicateTrue, PredicateFalse, PredicateTest, PredicateNeg, PredicateAnd, PredicateOr,
    PolicyTag, PolicyFilter, PolicyMod, PolicyPar, PolicySeq, PolicyStar, PolicyChoice, PolicyLink,
    ptrue, pfalse, test, neg, and, or,
    filter, mod, par, seq, star, choice, link, parOf, seqOf,
    removeLinks, collectLinks
};
