/**
 * Agent Capabilities
 *
 * Closed set of capability tags used for routing, plus the fixed table that
 * maps free-form intents onto them.
 */

export enum AgentCapability {
  // Ticketing
  TICKET_PURCHASE = 'ticket_purchase',
  TICKET_UPGRADE = 'ticket_upgrade',
  TICKET_REFUND = 'ticket_refund',
  TICKET_INQUIRY = 'ticket_inquiry',

  // Sales
  SALES_PROPOSAL = 'sales_proposal',
  CRM_MANAGEMENT = 'crm_management',
  PIPELINE_TRACKING = 'pipeline_tracking',
  LEAD_QUALIFICATION = 'lead_qualification',

  // Finance
  EXPENSE_APPROVAL = 'expense_approval',
  BUDGET_TRACKING = 'budget_tracking',
  INVOICE_GENERATION = 'invoice_generation',
  FINANCIAL_REPORTING = 'financial_reporting',

  // HR
  CANDIDATE_SCREENING = 'candidate_screening',
  INTERVIEW_SCHEDULING = 'interview_scheduling',
  ONBOARDING = 'onboarding',
  EMPLOYEE_INQUIRY = 'employee_inquiry',

  // General
  INTENT_CLASSIFICATION = 'intent_classification',
  ESCALATION = 'escalation',
  NOTIFICATION = 'notification',
}

export const ALL_CAPABILITIES: readonly AgentCapability[] = Object.values(AgentCapability);

/**
 * Intent → capability lookup. Keys are lower-case.
 */
export const INTENT_CAPABILITIES: Readonly<Record<string, AgentCapability>> = Object.freeze({
  purchase_tickets: AgentCapability.TICKET_PURCHASE,
  buy_tickets: AgentCapability.TICKET_PURCHASE,
  upgrade_seats: AgentCapability.TICKET_UPGRADE,
  upgrade_tickets: AgentCapability.TICKET_UPGRADE,
  refund_tickets: AgentCapability.TICKET_REFUND,
  cancel_order: AgentCapability.TICKET_REFUND,
  ticket_info: AgentCapability.TICKET_INQUIRY,
  event_info: AgentCapability.TICKET_INQUIRY,

  create_proposal: AgentCapability.SALES_PROPOSAL,
  update_crm: AgentCapability.CRM_MANAGEMENT,
  check_pipeline: AgentCapability.PIPELINE_TRACKING,
  qualify_lead: AgentCapability.LEAD_QUALIFICATION,

  approve_expense: AgentCapability.EXPENSE_APPROVAL,
  check_budget: AgentCapability.BUDGET_TRACKING,
  generate_invoice: AgentCapability.INVOICE_GENERATION,
  financial_report: AgentCapability.FINANCIAL_REPORTING,

  screen_candidate: AgentCapability.CANDIDATE_SCREENING,
  schedule_interview: AgentCapability.INTERVIEW_SCHEDULING,
  onboard_employee: AgentCapability.ONBOARDING,
  hr_inquiry: AgentCapability.EMPLOYEE_INQUIRY,
});

export function isAgentCapability(value: string): value is AgentCapability {
  return ALL_CAPABILITIES.some(capability => capability === value);
}

/**
 * Map an intent onto its capability, or undefined when the table has no entry
 */
export function capabilityForIntent(intent: string): AgentCapability | undefined {
  const key = intent.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(INTENT_CAPABILITIES, key) ? INTENT_CAPABILITIES[key] : undefined;
}
