import { Global, Module } from "@nestjs/common";
import { InMemoryTokenLedger } from "./in-memory-token-ledger";
import { TokenLedger } from "./token-ledger";

@Global()
@Module({
  providers: [
    InMemoryTokenLedger,
    { provide: TokenLedger, useExisting: InMemoryTokenLedger },
  ],
  exports: [TokenLedger, InMemoryTokenLedger],
})
export class TokenModule {}
