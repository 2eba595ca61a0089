import { Module } from "@nestjs/common";
import { SubmissionValidatorService } from "./submission-validator.service";

@Module({
  providers: [SubmissionValidatorService],
  exports: [SubmissionValidatorService],
})
export class SubmissionsModule {}
