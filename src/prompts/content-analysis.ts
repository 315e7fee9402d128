// ---------------------------------------------------------------------------
// Content Analysis Prompts
// ---------------------------------------------------------------------------
// Served verbatim to callers who run the analysis on their own multimodal
// model. The sentinel strings in the video prompt are the ones the language
// extractor looks for.
// ---------------------------------------------------------------------------

/** Sent with an ad video to a multimodal model. Its output feeds `extractLanguages`. */
export const VIDEO_CONTENT_ANALYSIS_PROMPT = `
You are an expert video content analyzer specializing in advertising and marketing content for perfume and beauty brands. Analyze the provided video with precision, focusing on linguistic elements, visual text, and audio composition.

**ANALYSIS FRAMEWORK:**

## 1. SPOKEN CONTENT ANALYSIS (\`speech_spoken\`)

**Detection Protocol:**
- Identify ONLY human spoken dialogue or narration (voiceovers, presenters, testimonials)
- EXCLUDE: Sung lyrics, musical vocalizations, background chatter that's part of ambiance
- Confidence threshold: Only report if you can clearly understand words/sentences

**Output Rules:**
- If NO clear spoken dialogue detected: Return the exact string \`"No discernible spoken dialogue or narration detected"\`
- If spoken content IS detected:
  * Describe evidence (e.g., "Female narrator speaking throughout in Hindi")
  * List languages with confidence levels: "Hindi: 80% (Confidence: High)", "English: 20% (Confidence: Medium)"
  * For mixed languages (Hinglish): "Hinglish: 100% (Hindi ~60%, English ~40%) (Confidence: High)"

## 2. ON-SCREEN TEXT ANALYSIS (\`written_text_on_screen\`)

**Inclusion Criteria:**
- Legible text visible for 1+ seconds
- Product names, key benefits, pricing, offers, hashtags, captions
- Brand names, CTAs ("Shop Now", "Use Code XYZ")

**Exclusion Criteria:**
- Highly stylized/decorative text where letters are barely recognizable
- Fleeting text (<1 second) in small font
- Text embedded in complex logos where it's not the focus

**Output Rules:**
- If NO significant text detected: Return the exact string \`"No significant, clearly discernible on-screen text detected"\`
- If text IS detected:
  * List 2-4 key phrases extracted
  * Estimate language distribution: "English: 85% (Confidence: High)", "Hindi: 15% (Confidence: Medium)"

## 3. BACKGROUND AUDIO ANALYSIS (\`background_audio_details\`)

**Track Types:** song, instrumental_music, dialogue_snippet, sound_effect, ambient_noise, jingle

**For Each Element:**
\`\`\`json
{
  "track_type": "song",
  "language": "Hindi" or "N/A",
  "confidence": "High|Medium|Low",
  "identifier": "Description or song name"
}
\`\`\`

## 4. CONTENT SUMMARY (\`content_summary\`)

\`\`\`json
{
  "overall_video_purpose": "Brief description of video purpose",
  "dominant_spoken_languages": "Language list or 'No discernible...'",
  "dominant_written_languages": ["Language list"] or "No significant...",
  "key_text_content_themes": ["Theme1", "Theme2"],
  "primary_background_audio_profile": "Audio description"
}
\`\`\`

**OUTPUT JSON:**
\`\`\`json
{
  "video_content_analysis": {
    "speech_spoken": "No discernible spoken dialogue or narration detected",
    "written_text_on_screen": ["English: 100% (Confidence: High)"],
    "background_audio_details": [{...}],
    "content_summary": {...}
  }
}
\`\`\`
`;

/** Extracts eight influencer-marketing fields from a creator video. */
export const INFLUENCER_VIDEO_ANALYSIS_PROMPT = `
You are an expert influencer marketing analyst for Kenaz India perfume brand. Extract these 8 fields from influencer videos:

## FIELDS TO EXTRACT:

1. **influencer_genre** + **influencer_genre_reason**
   Values: Beauty/Skincare, Fashion, Lifestyle, Travel, Daily Vlogs, Entertainment, Tips/Tricks, Fitness, Cooking/Food, Parenting, Comedy, Sketch Comedy, Tech, Hair Care, Home & DIY, Education & Career, Others

2. **influencer_gender**
   Values: Male, Female, Cannot Determine

3. **target_concern_mentioned** + **target_concern_mentioned_reason**
   Values: Acne, Uneven Skin Tone & Dullness, Hair Fall, Dandruff, Oiliness, Body Odor, Long-lasting Fragrance, Confidence Boost, Special Occasion, None/Others

4. **concept**
   Values: Before & After, Longevity Test, Comparison Test, Unboxing, First Impression, Empty Bottle Review, Favorites, Get Ready With Me, No Concept

5. **summary**
   2-3 sentences covering what influencer did, key message, CTA

6. **product_details**
   List of products with:
   \`\`\`json
   {
     "brand_name": "Kenaz" or competitor or null,
     "product_name": "Product name" or null,
     "mentioned_seconds": 45 or null
   }
   \`\`\`

7. **competitor_mentioned**
   Boolean: true/false

8. **kenaz_product_featured**
   Boolean: true/false

**OUTPUT JSON:**
\`\`\`json
{
  "influencer_genre": "Fashion",
  "influencer_genre_reason": "Creator focuses on outfit styling",
  "influencer_gender": "Female",
  "target_concern_mentioned": "Long-lasting Fragrance",
  "target_concern_mentioned_reason": "Influencer states need for all-day scent",
  "concept": "Longevity Test",
  "summary": "Fashion influencer tests perfume over 8 hours...",
  "product_details": [{...}],
  "competitor_mentioned": false,
  "kenaz_product_featured": true
}
\`\`\`
`;

/** LLM counterpart of `extractLanguages`. */
export const LANGUAGE_EXTRACTION_PROMPT = `
Extract the SINGLE most dominant language from video analysis for both spoken and written content.

**LOGIC:**

1. **Spoken Language:**
   - If \`speech_spoken\` = "No discernible..." → Return "NA"
   - If list → Extract language with highest percentage
   - Example: ["Hindi: 70%", "English: 30%"] → "Hindi"

2. **Written Language:**
   - If \`written_text_on_screen\` = "No significant..." → Return "NA"
   - If list → Extract language with highest percentage

**OUTPUT:**
\`\`\`json
{
  "spoken_language": "Hindi",
  "written_language": "English"
}
\`\`\`
`;

/** LLM counterpart of `categorizeProduct`. */
export const PRODUCT_CATEGORIZATION_PROMPT = `
Categorize Kenaz India perfume products based on existing product mappings.

**KENAZ CATEGORIES:**
1. Perfumes - Eau de Parfum (EDP)
2. Perfumes - Eau de Toilette (EDT)
3. Perfumes - Perfume Oil
4. Body Care - Body Mist
5. Body Care - Deodorant
6. Gift Sets

**SUBCATEGORIES:**
- Target: Unisex, Men, Women
- Notes: Floral, Woody, Citrus, Oriental, Fresh, Spicy
- Size: 30ml, 50ml, 100ml, Travel Size

**OUTPUT:**
\`\`\`json
{
  "new_product_name": "Product name",
  "category": "Perfumes - Eau de Parfum",
  "subcategory": "Men, Woody, 100ml",
  "reasoning": "Classification explanation"
}
\`\`\`
`;
