/**
 * Instruction templates sent to Gemini. Inputs are interpolated as-is,
 * with no truncation or escaping.
 */

export const IMAGE_ANALYSIS_INSTRUCTIONS: readonly string[] = [
  'Analyze this medical image and provide:',
  '1. **Description**: What the image shows',
  '2. **Findings**: Notable observations',
  '3. **Concerns**: Any potential issues',
  '4. **Recommendations**: Suggested next steps'
];

// Used for PDF, DOCX and plain-text uploads
export function buildReportPrompt(textContent: string, fileName: string = ''): string {
  return `Analyze the following medical report/text content from '${fileName}' and provide:
1. **Summary**: Brief overview of the findings
2. **Key Metrics**: Important values and their significance
3. **Potential Concerns**: Any abnormal values or findings
4. **Recommendations**: Suggested next steps or actions

Report content: ${textContent}`;
}

export function buildSymptomPrompt(message: string): string {
  return `The user is describing a health issue. Provide comprehensive information based on their description, covering the following aspects clearly and concisely, using markdown for readability:
1. **Symptoms:** List the symptoms associated with the described issue.
2. **Possible Diseases/Conditions:** Suggest potential diseases or conditions that match the symptoms.
3. **Home Remedies:** Suggest what action or food item can be taken at home to cure or feel better according to the disease.
4. **Dietary Advice:** Recommend what can be eaten or avoided to help manage or cure the condition.
5. **Medicines (General Advice):** Provide general types of over-the-counter or common medicines that might be used (stressing this is not medical advice and a doctor should be consulted).
6. **Exercises/Activities:** Suggest exercises or activities that could be beneficial, or those to avoid.
7. **Other Relevant Information:** Include any other important tips, precautions, or when to seek professional medical help.

User's health issue: "${message}"
`;
}
