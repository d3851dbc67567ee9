import {
    createConnection,
    TextDocuments,
    TextDocumentSyncKind,
    ProposedFeatures,
    InitializeParams,
    InitializeResult,
    DidChangeConfigurationNotification
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { registerAllHandlers } from './lsp/registerAll';
import { legend } from './lsp/semanticTokens';
import { TokenCache } from './analysis/project/cache';
import { JBPL_LANGUAGE } from './analysis/lexer/language';
import { DEFAULT_SETTINGS, JbplSettings, getConfiguration } from './util/config';


// Create LSP connection (stdio or Node IPC autodetect).
const connection = createConnection(ProposedFeatures.all);

// Track open documents — in-memory mirror of the client.
export const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

const cache = new TokenCache();
let settings: JbplSettings = { ...DEFAULT_SETTINGS };
let supportsConfiguration = false;

connection.onInitialize((params: InitializeParams): InitializeResult => {
    supportsConfiguration = !!params.capabilities.workspace?.configuration;

    return {
        capabilities: {
            textDocumentSync: TextDocumentSyncKind.Incremental,
            semanticTokensProvider: {
                legend,
                full: true,
                range: false
            }
        },
        serverInfo: { name: `${JBPL_LANGUAGE.title} Language Server` }
    };
});

// Wire all feature handlers.
const revalidateOpenFiles = registerAllHandlers(connection, documents, cache, () => settings);

async function reloadSettings(): Promise<void> {
    if (!supportsConfiguration) return;
    settings = await getConfiguration(connection);
    console.log(
        `Settings: reportUnclassified=${settings.reportUnclassified}, ` +
        `reportUnterminated=${settings.reportUnterminated}, maxNumberOfProblems=${settings.maxNumberOfProblems}`
    );
    revalidateOpenFiles();
}

connection.onInitialized(() => {
    const setup = async () => {
        if (supportsConfiguration) {
            await connection.client.register(DidChangeConfigurationNotification.type, { section: JBPL_LANGUAGE.tag });
        }
        await reloadSettings();
        console.log(`${JBPL_LANGUAGE.title} language server ready (${JBPL_LANGUAGE.filenames.join(', ')})`);
    };
    setup().catch(err => console.warn(`Failed to finish initialization – ${String(err)}`));
});

connection.onDidChangeConfiguration(() => {
    reloadSettings().catch(err => console.warn(`Failed to reload settings – ${String(err)}`));
});

connection.onShutdown(() => {
    const stats = cache.getStats();
    console.log(`Token cache: ${stats.entries} entries, ${stats.hits} hits, ${stats.misses} misses`);
    cache.clear();
});

documents.listen(connection);

// Start listening after the handlers were registered.
connection.listen();
