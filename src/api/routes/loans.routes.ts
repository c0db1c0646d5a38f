/**
 * BNPL Credit Protocol - Loan API Routes
 *
 * Public reads plus borrower / merchant actions.
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { LoanOrchestratorService } from '../../modules/loans';
import { CreditLedgerService } from '../../core/credit';
import { DefaultDetectorService } from '../../modules/defaults';
import { getActor } from '../middleware/auth.middleware';
import { handleRouteError } from '../http-errors';
import {
  AddressSchema,
  AmountQuerySchema,
  CheckDefaultSchema,
  CreateLoanSchema,
  DefaultPreviewQuerySchema,
  DisputeSchema,
  LoanIdSchema,
} from '../schemas';
import {
  serializeCreditAccount,
  serializeDefaultPreview,
  serializeLoan,
  serializeLoanPreview,
  serializeSettings,
} from '../serializers';

export function createLoanRoutes(
  orchestrator: LoanOrchestratorService,
  creditLedger: CreditLedgerService,
  defaultDetector: DefaultDetectorService,
  actorAuth: RequestHandler
): Router {
  const router = Router();

  // ============================================================================
  // PUBLIC READS
  // ============================================================================

  /**
   * GET /v1/loans/preview?amount=
   * Fee, merchant payout and due time under the current settings.
   */
  router.get('/loans/preview', (req: Request, res: Response) => {
    try {
      const { amount } = AmountQuerySchema.parse(req.query);
      res.json(serializeLoanPreview(orchestrator.previewLoan(amount)));
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * GET /v1/loans/:id
   */
  router.get('/loans/:id', (req: Request, res: Response) => {
    try {
      const loanId = LoanIdSchema.parse(req.params.id);
      const loan = orchestrator.getLoan(loanId);
      if (!loan) {
        res.status(404).json({ error: `Loan ${loanId} not found` });
        return;
      }
      res.json({ loan: serializeLoan(loan) });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * GET /v1/borrowers/:address/loans
   * Loan history, oldest first.
   */
  router.get('/borrowers/:address/loans', (req: Request, res: Response) => {
    try {
      const borrower = AddressSchema.parse(req.params.address);
      res.json({
        borrower,
        active_loan_id: orchestrator.getActiveLoanId(borrower),
        loans: orchestrator.getLoansByBorrower(borrower).map(serializeLoan),
      });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * GET /v1/borrowers/:address/credit
   */
  router.get('/borrowers/:address/credit', (req: Request, res: Response) => {
    try {
      const user = AddressSchema.parse(req.params.address);
      res.json(
        serializeCreditAccount(
          creditLedger.getAccount(user),
          creditLedger.getAvailable(user),
          creditLedger.getUtilization(user)
        )
      );
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * GET /v1/borrowers/:address/eligibility?amount=
   */
  router.get('/borrowers/:address/eligibility', (req: Request, res: Response) => {
    try {
      const borrower = AddressSchema.parse(req.params.address);
      const { amount } = AmountQuerySchema.parse(req.query);
      res.json(orchestrator.checkEligibility(borrower, amount));
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * GET /v1/defaults/preview?user=&loan_id=
   */
  router.get('/defaults/preview', (req: Request, res: Response) => {
    try {
      const query = DefaultPreviewQuerySchema.parse(req.query);
      res.json(serializeDefaultPreview(defaultDetector.previewDefault(query.user, query.loan_id)));
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * GET /v1/settings
   */
  router.get('/settings', (_req: Request, res: Response) => {
    res.json(serializeSettings(orchestrator.getSettings(), defaultDetector.getGracePeriod()));
  });

  // ============================================================================
  // ACTOR ACTIONS
  // ============================================================================

  /**
   * POST /v1/loans
   * The authenticated borrower opens a loan, paying `merchant` immediately.
   */
  router.post('/loans', actorAuth, async (req: Request, res: Response) => {
    try {
      const body = CreateLoanSchema.parse(req.body);
      const loan = await orchestrator.createLoan(getActor(res), body.borrower, body.merchant, body.amount);
      res.status(201).json({ loan: serializeLoan(loan) });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /v1/loans/:id/repay
   * The authenticated borrower repays the full principal.
   */
  router.post('/loans/:id/repay', actorAuth, async (req: Request, res: Response) => {
    try {
      const loanId = LoanIdSchema.parse(req.params.id);
      const loan = await orchestrator.repayLoan(getActor(res), loanId);
      res.json({ loan: serializeLoan(loan) });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /v1/loans/:id/dispute
   */
  router.post('/loans/:id/dispute', actorAuth, async (req: Request, res: Response) => {
    try {
      const loanId = LoanIdSchema.parse(req.params.id);
      const { reason } = DisputeSchema.parse(req.body);
      await orchestrator.raiseDispute(getActor(res), loanId, reason);
      res.status(202).json({ loan_id: loanId, status: 'RECORDED' });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  /**
   * POST /v1/loans/:id/check-default
   * Keeper trigger for a single overdue loan.
   */
  router.post('/loans/:id/check-default', actorAuth, async (req: Request, res: Response) => {
    try {
      const loanId = LoanIdSchema.parse(req.params.id);
      const { borrower } = CheckDefaultSchema.parse(req.body);
      const defaulted = await orchestrator.checkDefault(getActor(res), borrower, loanId);
      res.json({ loan_id: loanId, defaulted });
    } catch (error) {
      handleRouteError(res, error);
    }
  });

  return router;
}
