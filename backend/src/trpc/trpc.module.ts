import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { VoltcastServicesModule } from "../voltcast-services.module";

@Module({
  imports: [VoltcastServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
