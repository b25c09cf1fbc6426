export const GUIDE_URI = 'memory://guide';

export const GUIDE_TEXT = `TAGGED MEMORY GUIDE
===================

Notes are stored per user (user_id, default "default") and kept only while
the server runs.

CATEGORIES
- personal: family, friends, home, hobbies, feelings
- professional: work, career, clients, projects, business
- technical: code, programs, APIs, servers, algorithms, bugs
- general: anything matching none of the above

Categories are picked by counting keywords (Portuguese word lists). On a tie
the order personal, professional, technical decides.

TOOLS
1. save_memory: save a note, categorized automatically unless a category is given
2. retrieve_memories: list notes, most recent first (default limit 10)
3. categorize_text: classify text without saving it
4. delete_memory: remove one note by id
5. search_memories: case-insensitive text search, in saved order, max 10 results
6. get_memory_stats: totals per category, oldest and newest note
`;
