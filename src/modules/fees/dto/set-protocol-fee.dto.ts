import { IsInt, Max, Min } from "class-validator";

export class SetProtocolFeeDto {
  @IsInt()
  @Min(0)
  @Max(10000)
  protocolFeeBps!: number;
}
