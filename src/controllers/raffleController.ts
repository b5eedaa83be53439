import { Request, Response } from "express";
import { ApiResponse, RaffleStatusView } from "../types";
import { Raffle } from "../services/raffle";
import { decodePerformData } from "../services/upkeepCoordinator";
import { WinnerRepository } from "../db/winnerRepository";
import {
  enterRaffleSchema,
  eventsQuerySchema,
  performUpkeepSchema,
  playerIndexParamsSchema,
  winnersQuerySchema,
} from "../middleware/validation";
import { RaffleError } from "../utils/raffleErrors";
import {
  auditAction,
  auditSuccess,
  auditFailure,
  AuditActionType,
  auditLogger,
  sanitizeErrorResponse,
  createErrorResponse,
} from "../utils/auditLogger";
import { raffleStatusView, serializeEvent } from "../utils/serialize";

/**
 * Answer with the envelope for a failed operation. Raffle errors carry their
 * own status and code; anything else is a 500 with a sanitized message.
 */
export function sendRaffleError(
  res: Response,
  error: unknown,
  fallbackMessage: string
): void {
  if (error instanceof RaffleError) {
    const response: ApiResponse<null> = {
      success: false,
      error: error.message,
      code: error.code,
      details: error.details,
    };
    res.status(error.statusCode).json(response);
    return;
  }

  const { logDetails } = sanitizeErrorResponse(error, fallbackMessage);
  console.error(`${fallbackMessage}:`, logDetails);
  const response: ApiResponse<null> = createErrorResponse(error, fallbackMessage);
  res.status(500).json(response);
}

export function createRaffleController(raffle: Raffle, winners: WinnerRepository) {
  const { ledger, coordinator, events } = raffle;

  return {
    // Full read-only query surface
    getRaffle(_req: Request, res: Response): void {
      const response: ApiResponse<RaffleStatusView & { players: string[] }> = {
        success: true,
        data: { ...raffleStatusView(raffle), players: ledger.getPlayers() },
      };
      res.json(response);
    },

    getPlayer(req: Request, res: Response): void {
      try {
        const { index } = playerIndexParamsSchema.parse(req.params);
        const position = Number(index);
        const player = ledger.getPlayer(position);
        res.json({ success: true, data: { index: position, player } });
      } catch (error) {
        sendRaffleError(res, error, "Failed to fetch player");
      }
    },

    getUpkeep(_req: Request, res: Response): void {
      const result = coordinator.checkUpkeep();
      res.json({
        success: true,
        data: { ...result, failedChecks: decodePerformData(result.performData) },
      });
    },

    enterRaffle(req: Request, res: Response): void {
      try {
        const { participant, amount } = enterRaffleSchema.parse(req.body);
        const numberOfPlayers = ledger.enterRaffle(participant, BigInt(amount));

        res.status(201).json({
          success: true,
          data: {
            participant: ledger.getPlayer(numberOfPlayers - 1),
            numberOfPlayers,
            pooledBalance: ledger.getPooledBalance().toString(),
          },
        });
      } catch (error) {
        sendRaffleError(res, error, "Failed to enter raffle");
      }
    },

    async performUpkeep(req: Request, res: Response): Promise<void> {
      const startTime = auditLogger.startTimer();

      auditAction(AuditActionType.PERFORM_UPKEEP, req, {
        players: ledger.getNumberOfPlayers(),
        state: ledger.getRaffleState(),
      });

      try {
        const { performData } = performUpkeepSchema.parse(req.body);
        const requestId = await coordinator.performUpkeep(performData);

        auditSuccess(
          AuditActionType.PERFORM_UPKEEP,
          req,
          { requestId: requestId.toString() },
          startTime
        );
        res.status(202).json({
          success: true,
          data: { requestId: requestId.toString() },
        });
      } catch (error) {
        auditFailure(
          AuditActionType.PERFORM_UPKEEP,
          req,
          error instanceof Error ? error.message : String(error),
          {},
          startTime
        );
        sendRaffleError(res, error, "Failed to perform upkeep");
      }
    },

    getEvents(req: Request, res: Response): void {
      // Newest `limit` events (default 50), skipping `offset` of the most recent
      const { type, limit, offset } = eventsQuerySchema.parse(req.query);
      const list = events
        .recent(
          type,
          limit ? parseInt(limit, 10) : 50,
          offset ? parseInt(offset, 10) : 0
        )
        .map(serializeEvent);
      res.json({ success: true, data: list });
    },

    async getWinners(req: Request, res: Response): Promise<void> {
      try {
        const { limit } = winnersQuerySchema.parse(req.query);
        const rows = await winners.getRecentWinners(limit ? parseInt(limit, 10) : 10);
        res.json({ success: true, data: rows });
      } catch (error) {
        sendRaffleError(res, error, "Failed to fetch winners");
      }
    },
  };
}

export type RaffleController = ReturnType<typeof createRaffleController>;
