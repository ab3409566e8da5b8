//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

enum Field {
    InPort = "InPort",
    EthSrc = "EthSrc",
    EthDst = "EthDst",
    EthType = "EthType",
    Vlan = "Vlan",
    VlanPcp = "VlanPcp",
    IPProto = "IPProto",
    IP4Src = "IP4Src",
    IP4Dst = "IP4Dst",
    TCPSrcPort = "TCPSrcPort",
    TCPDstPort = "TCPDstPort",
    Switch = "Switch"
}

//order of the Packet datatype constructor arguments
const allFields: readonly Field[] = [
    Field.InPort,
    Field.EthSrc,
    Field.EthDst,
    Field.EthType,
    Field.Vlan,
    Field.VlanPcp,
    Field.IPProto,
    Field.IP4Src,
    Field.IP4Dst,
    Field.TCPSrcPort,
    Field.TCPDstPort,
    Field.Switch
];

const fieldWidths: ReadonlyMap<Field, bigint> = new Map<Field, bigint>([
    [Field.InPort, 32n],
    [Field.EthSrc, 48n],
    [Field.EthDst, 48n],
    [Field.EthType, 16n],
    [Field.Vlan, 12n],
    [Field.VlanPcp, 3n],
    [Field.IPProto, 8n],
    [Field.IP4Src, 32n],
    [Field.IP4Dst, 32n],
    [Field.TCPSrcPort, 16n],
    [Field.TCPDstPort, 16n],
    [Field.Switch, 64n]
]);

function isField(name: string): name is Field {
    return allFields.some((f) => f === name);
}

function fieldMax(f: Field): bigint {
    const width = fieldWidths.get(f);
    assert(width !== undefined, `no width for field ${f}`);

    return (2n ** width) - 1n;
}

function checkFieldValue(f: Field, v: bigint): bigint {
    assert(0n <= v && v <= fieldMax(f), `value ${v} does not fit in field ${f}`);
    return v;
}

//name of the SMT accessor function for a field
function fieldAccessor(f: Field): string {
    return `pkt@${f}`;
}

/**
 * A packet variable of the SMT encoding. The drop sentinel is not a SymbolicPacket, it is the
 * nullary `nopacket` constructor of the Packet datatype.
 */
class SymbolicPacket {
    readonly name: string;

    constructor(name: string) {
        this.name = name;
    }

    toString(): string {
        return this.name;
    }
}

const NO_PACKET_NAME = "nopacket";
const PACKET_CONS_NAME = "packet";

export {
    Field, allFields, fieldWidths, isField, fieldMax, checkFieldValue, fieldAccessor,
    SymbolicPacket,
    NO_PACKET_NAME, PACKET_CONS_NAME
};
