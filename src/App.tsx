import { useEffect } from 'react';
import { Toaster } from 'sonner';
import { startTakeoffSession } from './bootstrap';
import { useCategoryStore, useDocumentViewStore } from './store';
import { formatCategoryTotals, formatSummary } from './utils/takeoffTotals';

function App() {
  const activeDocument = useDocumentViewStore((state) => state.document);
  const currentPage = useDocumentViewStore((state) => state.currentPage);
  const categories = useCategoryStore((state) => state.categories);
  const totals = useCategoryStore((state) => state.totals);

  useEffect(() => {
    const session = startTakeoffSession();
    session.ready.catch((error: unknown) => {
      console.error('❌ APP: Session setup failed:', error);
    });
    return session.stop;
  }, []);

  return (
    <div className="takeoff-app">
      <header>
        <h1>Takeoff Markup</h1>
        <p>
          {activeDocument
            ? `${activeDocument.path} (page ${currentPage + 1} of ${activeDocument.pageCount})`
            : 'No document open'}
        </p>
      </header>

      <main>
        {categories.map((category) => (
          <section key={category.name}>
            <h2>{category.name}</h2>
            <ul>
              {category.entries.map((entry) => (
                <li key={entry.id}>
                  {entry.label}: {entry.name || 'Unnamed'}
                </li>
              ))}
            </ul>
            <p>{formatCategoryTotals(category)}</p>
          </section>
        ))}
      </main>

      <footer>
        {formatSummary(totals).map((line) => (
          <p key={line}>{line}</p>
        ))}
      </footer>

      <Toaster position="top-right" richColors />
    </div>
  );
}

export default App;
