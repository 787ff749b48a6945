import type { SearchRequest } from '@jobcompass/listing-sdk';

export type StageId = 'job_search' | 'skills_analysis' | 'interview_prep' | 'career_advisory';

export interface StageContext {
  request: SearchRequest;
  /** Output of the search tool. */
  listingsText: string;
  /** Output of the job_search stage, present for every later stage. */
  jobSearchReport?: string;
}

export interface StageDefinition {
  id: StageId;
  title: string;
  system: string;
  buildPrompt(context: StageContext): string;
}

function persona(role: string, goal: string, background: string[]): string {
  return [`You are a ${role}.`, '', `Goal: ${goal}`, '', 'Background:', ...background.map((line) => `- ${line}`)].join(
    '\n',
  );
}

function reportContext(context: StageContext): string {
  return `<job_search_report>\n${context.jobSearchReport ?? context.listingsText}\n</job_search_report>`;
}

const jobSearchStage: StageDefinition = {
  id: 'job_search',
  title: 'Job Search',
  system: persona(
    'job search specialist and experienced technical recruiter',
    'turn raw job listings into a clear market report that other advisors can build on',
    [
      'Ten years of matching candidates to roles',
      'Spots vague, low-quality or spam postings quickly',
      'Reads requirements, seniority and pay signals out of job descriptions',
    ],
  ),
  buildPrompt: ({ request, listingsText }) =>
    [
      `Review the current openings for the "${request.role}" role in ${request.location}.`,
      '',
      `<job_listings>\n${listingsText}\n</job_listings>`,
      '',
      '<instructions>',
      '1. Summarize the search: number of listings, parameters, overall market observations.',
      '2. For each listing give title and company, location, salary range if known, key required skills,',
      '   description highlights and the application URL.',
      '3. Close with market insights: common skills, experience levels, salary trends, notable employers.',
      '4. If the listings above are an error or a no-results message, explain it and suggest next steps.',
      '</instructions>',
    ].join('\n'),
};

const skillsAnalysisStage: StageDefinition = {
  id: 'skills_analysis',
  title: 'Skills Analysis',
  system: persona(
    'skills development advisor and technical learning coach',
    'identify the skills these roles demand and lay out a prioritized learning roadmap',
    [
      'Eight years as a technical trainer and career coach',
      'Knows the online courses, certifications and projects that move a candidate forward',
      'Prioritizes skills by hiring impact, not by novelty',
    ],
  ),
  buildPrompt: (context) =>
    [
      `Based on the job search report for "${context.request.role}" positions, build a skills roadmap.`,
      '',
      reportContext(context),
      '',
      '<instructions>',
      '1. Extract technical skills, tools, soft skills, domain knowledge and certifications.',
      '2. Group them by category and mark each Critical, Important or Nice-to-have by how often it appears.',
      '3. For the high-priority skills recommend specific resources, a learning order and realistic timelines.',
      '4. Finish with the top five skills to start on now, quick wins and longer-term investments.',
      '</instructions>',
    ].join('\n'),
};

const interviewPrepStage: StageDefinition = {
  id: 'interview_prep',
  title: 'Interview Preparation',
  system: persona(
    'interview preparation coach and former hiring manager',
    'prepare the candidate for interviews for these specific openings',
    [
      'Has run over a thousand technical and behavioral interviews',
      'Coaches with the STAR method and company research',
      'Knows what interviewers listen for in strong answers',
    ],
  ),
  buildPrompt: (context) =>
    [
      `Prepare interview material for "${context.request.role}" positions found in the job search.`,
      '',
      reportContext(context),
      '',
      '<instructions>',
      '1. For each listing, write 8-10 likely questions mixing technical, behavioral and company-specific ones.',
      '2. For each question explain what the interviewer is assessing and outline a strong answer.',
      '3. Add company talking points and thoughtful questions the candidate can ask.',
      '4. End with a short preparation checklist for the week before the interview.',
      '</instructions>',
    ].join('\n'),
};

const careerAdvisoryStage: StageDefinition = {
  id: 'career_advisory',
  title: 'Career Advisory',
  system: persona(
    'career strategy advisor and executive coach',
    'give tailored application strategy for the roles and companies in the job search',
    [
      'Fifteen years advising candidates from new graduates to executives',
      'Resume and ATS optimization, LinkedIn visibility and personal branding',
      'Networking, application timing, follow-up and offer negotiation',
    ],
  ),
  buildPrompt: (context) =>
    [
      `Provide a career strategy for applying to "${context.request.role}" positions in ${context.request.location}.`,
      '',
      reportContext(context),
      '',
      '<instructions>',
      '1. Resume: keywords from the listings, achievements to emphasize, ATS formatting advice.',
      '2. LinkedIn: headline, summary and skills changes that raise recruiter visibility.',
      '3. Networking: people and communities to approach for these companies, with outreach examples.',
      '4. Applications: order of applying, tailoring per company, follow-up timing.',
      '5. Close with a two-week action plan.',
      '</instructions>',
    ].join('\n'),
};

/**
 * Execution order. Every stage after `job_search` reads its report.
 */
export const STAGES: readonly StageDefinition[] = [
  jobSearchStage,
  skillsAnalysisStage,
  interviewPrepStage,
  careerAdvisoryStage,
];
