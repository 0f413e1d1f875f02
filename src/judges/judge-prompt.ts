export type JudgeMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string };

/**
 * Build the evaluation prompt shared by every judge.
 * Judges walk through requirement extraction and evidence matching before scoring.
 */
export function buildJudgeMessages(
    cvText: string,
    jdText: string,
    guidance?: string,
    repairInstruction?: string
): JudgeMessage[] {
    const guidanceSection = guidance ? `\n\n**Special Guidance:** ${guidance}` : '';

    const messages: JudgeMessage[] = [
        {
            role: 'system',
            content: `You are an expert technical recruiter evaluating a candidate's CV against a job description.

Provide a structured, evidence-based evaluation:
1. Extract 3-5 key requirements from the job description
2. For each requirement, search for verbatim evidence in the CV
3. Identify matching skills and missing requirements
4. Note any red flags or concerns
5. Highlight the candidate's key strengths
6. Give an overall match score (0-100) with detailed rationale

Be specific and cite evidence directly from the documents. Do not invent qualifications.${guidanceSection}

Respond with a single JSON object:
{
    "score": integer (0-100),
    "matching_skills": string[],
    "missing_requirements": string[],
    "red_flags": string[],
    "strengths": string[],
    "rationale": string
}`
        },
        {
            role: 'user',
            content: `**Job Description:**
${jdText}

**Candidate CV:**
${cvText}`
        }
    ];

    if (repairInstruction) {
        messages.push({ role: 'user', content: repairInstruction });
    }

    return messages;
}

export function buildRepairInstruction(problem: string): string {
    return `Your previous response could not be used: ${problem}. ` +
        'Reply again with only the JSON object described above. "score" must be an integer from 0 to 100, ' +
        'every list field must be an array of strings and "rationale" must be a string.';
}
