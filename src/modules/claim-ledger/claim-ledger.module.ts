import { Global, Module } from "@nestjs/common";
import { ClaimLedger } from "./claim-ledger";
import { InMemoryClaimLedger } from "./in-memory-claim-ledger";

@Global()
@Module({
  providers: [
    InMemoryClaimLedger,
    { provide: ClaimLedger, useExisting: InMemoryClaimLedger },
  ],
  exports: [ClaimLedger, InMemoryClaimLedger],
})
export class ClaimLedgerModule {}
