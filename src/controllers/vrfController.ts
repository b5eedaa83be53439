import { Request, Response } from "express";
import { ApiResponse } from "../types";
import { Raffle } from "../services/raffle";
import { MockVrfCoordinator, MockVrfError } from "../services/mockVrfCoordinator";
import { fulfillRandomWordsSchema, mockFulfillSchema } from "../middleware/validation";
import {
  auditAction,
  auditSuccess,
  auditFailure,
  AuditActionType,
  auditLogger,
} from "../utils/auditLogger";
import { serializeOutcome } from "../utils/serialize";
import { sendRaffleError } from "./raffleController";

const MOCK_ERROR_STATUS: Record<string, number> = {
  "nonexistent request": 404,
  InvalidSubscription: 404,
  InvalidConsumer: 409,
  InvalidRandomWords: 400,
  InsufficientBalance: 402,
};

export function createVrfController(
  raffle: Raffle,
  mockCoordinator: MockVrfCoordinator | undefined
) {
  const { coordinator } = raffle;

  return {
    // Signed oracle callback
    async fulfillRandomWords(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();

      try {
        const body = fulfillRandomWordsSchema.parse(req.body);
        auditAction(AuditActionType.FULFILL_RANDOM_WORDS, req, {
          requestId: body.requestId,
          words: body.randomWords.length,
        });

        const outcome = await coordinator.rawFulfillRandomWords(
          BigInt(body.requestId),
          body.randomWords.map((word) => BigInt(word))
        );

        auditSuccess(
          AuditActionType.FULFILL_RANDOM_WORDS,
          req,
          { requestId: body.requestId, status: outcome.status },
          startTime
        );
        res.json({ success: true, data: serializeOutcome(outcome) });
      } catch (error) {
        auditFailure(
          AuditActionType.FULFILL_RANDOM_WORDS,
          req,
          error instanceof Error ? error.message : String(error),
          {},
          startTime
        );
        sendRaffleError(res, error, "Failed to fulfill random words");
      }
    },

    // Development networks only: have the mock coordinator deliver a request
    async mockFulfill(req: Request, res: Response): Promise<void> {
      if (!mockCoordinator) {
        res.status(404).json({
          success: false,
          error: "Mock coordinator is only available on development networks",
        });
        return;
      }

      const startTime = auditLogger.startTimer();

      try {
        const body = mockFulfillSchema.parse(req.body);
        const requestId = BigInt(body.requestId);
        auditAction(AuditActionType.MOCK_FULFILL, req, {
          requestId: body.requestId,
          override: Boolean(body.randomWords),
        });

        const result = body.randomWords
          ? await mockCoordinator.fulfillRandomWordsWithOverride(
              requestId,
              coordinator.consumerId,
              body.randomWords.map((word) => BigInt(word))
            )
          : await mockCoordinator.fulfillRandomWords(requestId, coordinator.consumerId);

        auditSuccess(
          AuditActionType.MOCK_FULFILL,
          req,
          { requestId: body.requestId, success: result.success },
          startTime
        );
        res.json({
          success: true,
          data: {
            requestId: result.requestId.toString(),
            payment: result.payment.toString(),
            success: result.success,
            randomWords: result.randomWords.map((word) => word.toString()),
          },
        });
      } catch (error) {
        auditFailure(
          AuditActionType.MOCK_FULFILL,
          req,
          error instanceof Error ? error.message : String(error),
          {},
          startTime
        );
        if (error instanceof MockVrfError) {
          const response: ApiResponse<null> = {
            success: false,
            error: error.message,
            code: error.reason,
          };
          res.status(MOCK_ERROR_STATUS[error.reason] ?? 400).json(response);
          return;
        }
        sendRaffleError(res, error, "Mock fulfillment failed");
      }
    },
  };
}
