//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import { SymbolicPacket } from "../../ast/packet";
import { MacroCache } from "./macro_cache";
import { SMTAssembly } from "./smt_assembly";
import { SMTVar } from "./smt_exp";

/**
 * Everything one verification run allocates: the macro table, the fresh-name counter and the
 * packet constants that must be declared. Make a new one per check; nothing here is shared.
 */
class VerificationContext {
    readonly macros: MacroCache = new MacroCache();

    private gensymctr = 0;
    private readonly packets: SymbolicPacket[] = [];

    freshPacket(): SymbolicPacket {
        const pkt = new SymbolicPacket(`pkt@${this.gensymctr++}`);
        this.packets.push(pkt);

        return pkt;
    }

    packetVar(pkt: SymbolicPacket): SMTVar {
        return new SMTVar(pkt.name);
    }

    declaredPackets(): SymbolicPacket[] {
        return [...this.packets];
    }

    createAssembly(): SMTAssembly {
        return new SMTAssembly(this.macros.allMacros(), this.declaredPackets());
    }
}

export {
    VerificationContext
};
